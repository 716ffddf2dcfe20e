/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
methodcheck - method declaration classifier and validator v${VERSION}

USAGE:
  methodcheck <command> [options]

COMMANDS:
  check [batch.json...]     Classify and validate declaration batches
  explain <code>            Describe a diagnostic code (e.g. SIG3001)

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress the summary line
  -c, --config <file>       Config file path (default: methodcheck.json)

CHECK OPTIONS:
  --json                    Print descriptors and diagnostics as JSON
  --constructor-name <n>    Reserved constructor name (default: __new__)
  --module-type <name>      Module type taken with pass-module (default: Module)

EXIT CODES:
  0  no diagnostics
  1  diagnostics reported
  2  unknown command or missing argument
  3  configuration or input error

EXAMPLES:
  methodcheck check declarations.json
  methodcheck check a.json b.json --json
  methodcheck explain SIG2001
`);
};
