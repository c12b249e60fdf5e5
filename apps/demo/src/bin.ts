#!/usr/bin/env node

/**
 * dashopt-demo entry point.
 */

import { runDemo } from "./demo.js";

try {
  process.exitCode = runDemo(process.argv.slice(2));
} catch (err) {
  console.error("Fatal error:", err);
  process.exitCode = 1;
}
