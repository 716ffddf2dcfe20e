/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic } from "@methodcheck/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { checkCommand, reportCheck } from "../commands/check.js";
import { explainCode } from "../commands/explain.js";
import type { MethodcheckConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`methodcheck v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.error) {
    console.error(`Error: ${parsed.error}`);
    console.error("Run 'methodcheck --help' for usage information");
    return 2;
  }

  // Handle explain (doesn't need config)
  if (parsed.command === "explain") {
    const code = parsed.inputs[0];
    if (!code) {
      console.error("Error: Diagnostic code required");
      console.error("Usage: methodcheck explain SIG3001");
      return 2;
    }
    const result = explainCode(code);
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return 2;
    }
    console.log(result.value);
    return 0;
  }

  if (parsed.command !== "check") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'methodcheck --help' for usage information");
    return 2;
  }

  // Config file is optional for check: defaults apply without one
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: MethodcheckConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return 3;
    }
    fileConfig = configResult.value;
  }

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    configPath ? dirname(configPath) : cwd,
    parsed.inputs,
    cwd
  );

  if (config.batchFiles.length === 0) {
    console.error("Error: No declaration batch given");
    console.error(
      "Pass a batch file, or set 'batch' in methodcheck.json"
    );
    return 2;
  }

  const report = checkCommand(config);
  if (!report.ok) {
    for (const diagnostic of report.error) {
      console.error(formatDiagnostic(diagnostic));
    }
    return 3;
  }

  return reportCheck(report.value, config);
};
