#!/usr/bin/env node

import { main } from "./main";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error("cherry-replay: unexpected error:", e);
    process.exitCode = 1;
  },
);
