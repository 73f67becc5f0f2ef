#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import { config as loadDotenv } from "dotenv";
import pc from "picocolors";
import { CommanderError } from "commander";
import { createProgram } from "./cli";
import { askFromReadline } from "./prompt";
import { errorMessage } from "./errors";

loadDotenv();

const rl = createInterface({ input: process.stdin, output: process.stdout });

const program = createProgram({
  env: process.env,
  ask: askFromReadline(rl),
});

console.log(pc.bold("Meraki API Usage Report"));

program
  .parseAsync(process.argv)
  .then(() => {
    rl.close();
  })
  .catch((err: unknown) => {
    rl.close();
    // commander has already printed its own usage errors
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }
    console.error(pc.red(errorMessage(err)));
    process.exitCode = 1;
  });
