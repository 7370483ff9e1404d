#!/usr/bin/env -S tsx
import { ScreenInputError } from "@shared/screen-errors";
import { USAGE, parseScreenCalcArgs, runScreenCalc } from "../tools/screen-calc-runner";
import { readScreenCalcConfig } from "../tools/screen-config";

function main() {
  const config = readScreenCalcConfig();
  try {
    const args = parseScreenCalcArgs(process.argv.slice(2));
    if (args.help) {
      console.log(USAGE);
      return;
    }
    const { lines } = runScreenCalc(args, config);
    for (const line of lines) {
      console.log(line);
    }
  } catch (err) {
    if (err instanceof ScreenInputError) {
      console.error(`error: ${err.message}`);
      console.error(USAGE);
      process.exit(2);
    }
    throw err;
  }
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
