/**
 * ParsedOptions — pending occurrences of one successful parse.
 *
 * Each key owns a FIFO queue; popValue() shifts from it. A sequence number
 * per occurrence keeps pending() in arrival order across keys.
 */

import type { IParsedOptions, ParsedOccurrence } from "@dashopt/sdk";

interface PendingOccurrence {
  seq: number;
  occurrence: ParsedOccurrence;
}

export function createParsedOptions(occurrences: readonly ParsedOccurrence[] = []): IParsedOptions {
  const queues = new Map<string, PendingOccurrence[]>();
  let size = 0;

  occurrences.forEach((occurrence, seq) => {
    const queue = queues.get(occurrence.key);
    if (queue) {
      queue.push({ seq, occurrence });
    } else {
      queues.set(occurrence.key, [{ seq, occurrence }]);
    }
    size++;
  });

  return {
    has(key: string): boolean {
      return queues.has(key);
    },

    popValue(key: string): string | undefined {
      const queue = queues.get(key);
      const next = queue?.shift();
      if (!queue || !next) return undefined;

      // has() relies on no empty queue staying in the map
      if (queue.length === 0) queues.delete(key);
      size--;
      return next.occurrence.value;
    },

    count(key: string): number {
      return queues.get(key)?.length ?? 0;
    },

    pending(): ParsedOccurrence[] {
      return [...queues.values()]
        .flat()
        .sort((a, b) => a.seq - b.seq)
        .map((entry) => ({ ...entry.occurrence }));
    },

    get size(): number {
      return size;
    },
  };
}
