/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

/**
 * Parse CLI arguments.
 * An option that takes a value but has none sets `error`.
 */
export const parseArgs = (
  args: string[]
): {
  command: string;
  inputs: string[]; // Positional args after the command
  options: CliOptions;
  error?: string;
} => {
  const options: CliOptions = {};
  let command = "";
  const inputs: string[] = [];
  const problems: string[] = [];

  const takeValue = (index: number): string | undefined => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith("-")) {
      problems.push(`Option '${args[index] ?? ""}' requires a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Positional args after command (batch files, diagnostic codes)
    if (command && !arg.startsWith("-")) {
      inputs.push(arg);
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", inputs: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", inputs: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "--json":
        options.json = true;
        break;
      case "-c":
      case "--config": {
        const value = takeValue(i);
        if (value !== undefined) {
          options.config = value;
          i++;
        }
        break;
      }
      case "--constructor-name": {
        const value = takeValue(i);
        if (value !== undefined) {
          options.constructorName = value;
          i++;
        }
        break;
      }
      case "--module-type": {
        const value = takeValue(i);
        if (value !== undefined) {
          options.moduleTypeName = value;
          i++;
        }
        break;
      }
    }
  }

  const [error] = problems;
  return error === undefined
    ? { command, inputs, options }
    : { command, inputs, options, error };
};
