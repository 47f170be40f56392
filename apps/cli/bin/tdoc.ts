#!/usr/bin/env tsx

import { run } from "../src";

/**
 * Exit quietly when the reader of stdout goes away (`tdoc page.ftml | head`).
 */
function setupStreamHandlers(): void {
  process.stdout.on("error", (error: NodeJS.ErrnoException) => {
    if (error.code === "EPIPE") {
      process.exit(0);
    }
    throw error;
  });
}

setupStreamHandlers();

run().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
);
