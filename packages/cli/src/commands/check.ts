/**
 * methodcheck check command - validate declaration batches
 */

import {
  type Declaration,
  type Diagnostic,
  type Result,
  type ValidationResult,
  collectResults,
  formatDiagnostic,
  loadDeclarationBatch,
  validateDeclarations,
} from "@methodcheck/frontend";
import type { ResolvedConfig } from "../types.js";

export type CheckReport = {
  readonly declarationCount: number;
  readonly result: ValidationResult;
};

/**
 * Load every batch file, reporting input errors from all of them
 */
const loadBatches = (
  batchFiles: readonly string[]
): Result<readonly Declaration[], readonly Diagnostic[]> => {
  const loaded = collectResults(batchFiles.map(loadDeclarationBatch));
  return loaded.ok ? { ok: true, value: loaded.value.flat() } : loaded;
};

/**
 * Run validation over the configured batches
 */
export const checkCommand = (
  config: ResolvedConfig
): Result<CheckReport, readonly Diagnostic[]> => {
  const { batchFiles, validation, verbose } = config;

  if (verbose) {
    for (const file of batchFiles) {
      console.log(`Loading ${file}`);
    }
  }

  const declarations = loadBatches(batchFiles);
  if (!declarations.ok) {
    return declarations;
  }

  if (verbose) {
    console.log(
      `Validating ${declarations.value.length} declaration(s) (constructor name: ${validation.constructorName}, module type: ${validation.moduleTypeName})`
    );
  }

  return {
    ok: true,
    value: {
      declarationCount: declarations.value.length,
      result: validateDeclarations(declarations.value, validation),
    },
  };
};

/**
 * Summary line printed after a check
 */
export const formatSummary = (report: CheckReport): string => {
  const { declarationCount, result } = report;
  const errorCount = result.diagnostics.length;
  const plural = (count: number, noun: string) =>
    `${count} ${noun}${count === 1 ? "" : "s"}`;

  return `Checked ${plural(declarationCount, "declaration")}: ${plural(result.descriptors.length, "method")} valid, ${plural(errorCount, "error")}`;
};

/**
 * Print a check report and return the process exit code
 */
export const reportCheck = (
  report: CheckReport,
  config: ResolvedConfig
): number => {
  const { result } = report;

  if (config.json) {
    console.log(
      JSON.stringify(
        { descriptors: result.descriptors, diagnostics: result.diagnostics },
        null,
        2
      )
    );
  } else {
    for (const diagnostic of result.diagnostics) {
      console.error(formatDiagnostic(diagnostic));
    }
    if (!config.quiet) {
      console.log(formatSummary(report));
    }
  }

  return result.ok ? 0 : 1;
};
