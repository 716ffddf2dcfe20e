/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  type Result,
  resolveValidationOptions,
} from "@methodcheck/frontend";
import type { MethodcheckConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "methodcheck.json";

const isStringList = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isRecord = (
  value: unknown
): value is { readonly [key: string]: unknown } =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (
  data: { readonly [key: string]: unknown },
  key: string
): Result<string | undefined, string> => {
  const value = data[key];
  return value === undefined || typeof value === "string"
    ? { ok: true, value }
    : { ok: false, error: `${CONFIG_FILE_NAME}: '${key}' must be a string` };
};

const readBatch = (
  value: unknown
): Result<string | readonly string[] | undefined, string> => {
  if (value === undefined) {
    return { ok: true, value: undefined };
  }
  if (typeof value === "string" || isStringList(value)) {
    return { ok: true, value };
  }
  return {
    ok: false,
    error: `${CONFIG_FILE_NAME}: 'batch' must be a path or a list of paths`,
  };
};

/**
 * Check the parsed file against the config shape
 */
const validateConfig = (data: unknown): Result<MethodcheckConfig, string> => {
  if (!isRecord(data)) {
    return { ok: false, error: `${CONFIG_FILE_NAME} must contain an object` };
  }

  const schema = optionalString(data, "$schema");
  if (!schema.ok) return schema;
  const constructorName = optionalString(data, "constructorName");
  if (!constructorName.ok) return constructorName;
  const moduleTypeName = optionalString(data, "moduleTypeName");
  if (!moduleTypeName.ok) return moduleTypeName;

  const batch = readBatch(data.batch);
  if (!batch.ok) return batch;

  return {
    ok: true,
    value: {
      $schema: schema.value,
      constructorName: constructorName.value,
      moduleTypeName: moduleTypeName.value,
      batch: batch.value,
    },
  };
};

/**
 * Load methodcheck.json
 */
export const loadConfig = (
  configPath: string
): Result<MethodcheckConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return validateConfig(JSON.parse(content));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find methodcheck.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find methodcheck.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * Batch paths from the command line are taken relative to the working
 * directory; paths from the config file relative to the project root.
 */
export const resolveConfig = (
  config: MethodcheckConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  inputs: readonly string[] = [],
  cwd: string = projectRoot
): ResolvedConfig => {
  const configBatches =
    config.batch === undefined
      ? []
      : typeof config.batch === "string"
        ? [config.batch]
        : config.batch;

  const batchFiles =
    inputs.length > 0
      ? inputs.map((input) => resolve(cwd, input))
      : configBatches.map((batch) => resolve(projectRoot, batch));

  return {
    projectRoot,
    batchFiles,
    validation: resolveValidationOptions({
      constructorName: cliOptions.constructorName ?? config.constructorName,
      moduleTypeName: cliOptions.moduleTypeName ?? config.moduleTypeName,
    }),
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
    json: cliOptions.json ?? false,
  };
};
