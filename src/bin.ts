#!/usr/bin/env node
import { main } from "./index.js";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("ics-timeshift failed unexpectedly", error);
    process.exitCode = 1;
  },
);
