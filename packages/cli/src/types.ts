/**
 * Type definitions for CLI
 */

import type { ValidationOptions } from "@methodcheck/frontend";

/**
 * methodcheck configuration file (methodcheck.json)
 */
export type MethodcheckConfig = {
  readonly $schema?: string;
  readonly constructorName?: string;
  readonly moduleTypeName?: string;
  readonly batch?: string | readonly string[];
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  config?: string;
  constructorName?: string;
  moduleTypeName?: string;
};

/**
 * Resolved configuration (after merging config file and CLI options)
 */
export type ResolvedConfig = {
  readonly projectRoot: string;
  readonly batchFiles: readonly string[];
  readonly validation: ValidationOptions;
  readonly verbose: boolean;
  readonly quiet: boolean;
  readonly json: boolean;
};
