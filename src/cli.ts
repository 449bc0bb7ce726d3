#!/usr/bin/env node

import { main } from "./program";

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? `Error: ${error.message}` : String(error));
    process.exitCode = 1;
  });
