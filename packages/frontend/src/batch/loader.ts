/**
 * Declaration batch loader - reads and validates a JSON batch file.
 *
 * The file is `{ "declarations": [...] }`, each entry mirroring the
 * Declaration model with every span spelled out as
 * `{ file, line, column, length }`. Structural problems are reported as
 * diagnostics, all of them at once.
 */

import * as fs from "fs";
import * as path from "path";
import type { Result } from "../types/result.js";
import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import type {
  Declaration,
  DeclarationOwner,
  DeclarationParameter,
  GenericParameter,
  Receiver,
  ReceiverKind,
  TypeRef,
} from "../model/declaration.js";
import {
  type Marker,
  type MarkerKind,
  ROLE_MARKER_KINDS,
  AUXILIARY_MARKER_KINDS,
} from "../model/markers.js";

type JsonObject = { readonly [key: string]: unknown };

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const RECEIVER_KINDS: readonly ReceiverKind[] = ["byRef", "byMutRef", "byValue"];
const OWNERS: readonly DeclarationOwner[] = ["type", "module"];
const TYPE_KINDS: readonly TypeRef["kind"][] = ["path", "opaque"];
const MARKER_KINDS: readonly MarkerKind[] = [
  ...ROLE_MARKER_KINDS,
  ...AUXILIARY_MARKER_KINDS,
];

const oneOf = <T extends string>(
  allowed: readonly T[],
  value: unknown
): T | undefined => allowed.find((candidate) => candidate === value);

/**
 * Collects problems for one declaration entry, each tagged with its field path
 */
type Problems = string[];

const readString = (
  obj: JsonObject,
  key: string,
  at: string,
  problems: Problems
): string | undefined => {
  const value = obj[key];
  if (typeof value !== "string") {
    problems.push(`'${at}${key}' must be a string`);
    return undefined;
  }
  return value;
};

const readBoolean = (
  obj: JsonObject,
  key: string,
  at: string,
  problems: Problems
): boolean => {
  const value = obj[key];
  if (value === undefined) return false;
  if (typeof value !== "boolean") {
    problems.push(`'${at}${key}' must be a boolean`);
    return false;
  }
  return value;
};

const readSpan = (
  value: unknown,
  at: string,
  problems: Problems
): SourceLocation | undefined => {
  if (!isObject(value)) {
    problems.push(`'${at}' must be a span object`);
    return undefined;
  }
  const { file, line, column, length } = value;
  if (
    typeof file !== "string" ||
    typeof line !== "number" ||
    typeof column !== "number" ||
    typeof length !== "number"
  ) {
    problems.push(
      `'${at}' must have string 'file' and numeric 'line', 'column', 'length'`
    );
    return undefined;
  }
  return { file, line, column, length };
};

const readArray = (
  obj: JsonObject,
  key: string,
  at: string,
  problems: Problems
): readonly unknown[] => {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    problems.push(`'${at}${key}' must be an array`);
    return [];
  }
  return value;
};

const readTypeRef = (
  value: unknown,
  at: string,
  problems: Problems
): TypeRef | undefined => {
  if (!isObject(value)) {
    problems.push(`'${at}' must be a type object`);
    return undefined;
  }
  const span = readSpan(value.span, `${at}.span`, problems);
  const kind = oneOf(TYPE_KINDS, value.kind);

  switch (kind) {
    case "path": {
      const text = readString(value, "text", `${at}.`, problems);
      const isReference = readBoolean(value, "isReference", `${at}.`, problems);
      return text !== undefined && span
        ? { kind: "path", text, isReference, span }
        : undefined;
    }
    case "opaque": {
      const bound = readString(value, "bound", `${at}.`, problems);
      return bound !== undefined && span
        ? { kind: "opaque", bound, span }
        : undefined;
    }
    case undefined:
      problems.push(`'${at}.kind' must be "path" or "opaque"`);
      return undefined;
  }
};

const readReceiver = (
  value: unknown,
  problems: Problems
): Receiver | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isObject(value)) {
    problems.push(`'receiver' must be an object`);
    return undefined;
  }
  const kind = oneOf(RECEIVER_KINDS, value.kind);
  if (!kind) {
    problems.push(`'receiver.kind' must be one of: ${RECEIVER_KINDS.join(", ")}`);
  }
  const span = readSpan(value.span, "receiver.span", problems);
  return kind && span ? { kind, span } : undefined;
};

const readParameter = (
  value: unknown,
  at: string,
  problems: Problems
): DeclarationParameter | undefined => {
  if (!isObject(value)) {
    problems.push(`'${at}' must be an object`);
    return undefined;
  }
  const name = readString(value, "name", `${at}.`, problems);
  const type = readTypeRef(value.type, `${at}.type`, problems);
  const hasDefault = readBoolean(value, "hasDefault", `${at}.`, problems);
  const span = readSpan(value.span, `${at}.span`, problems);
  return name !== undefined && type && span
    ? { name, type, hasDefault, span }
    : undefined;
};

const readGenericParameter = (
  value: unknown,
  at: string,
  problems: Problems
): GenericParameter | undefined => {
  if (!isObject(value)) {
    problems.push(`'${at}' must be an object`);
    return undefined;
  }
  const name = readString(value, "name", `${at}.`, problems);
  const span = readSpan(value.span, `${at}.span`, problems);
  return name !== undefined && span ? { name, span } : undefined;
};

const readOptionalString = (
  obj: JsonObject,
  key: string,
  at: string,
  problems: Problems
): string | undefined =>
  obj[key] === undefined ? undefined : readString(obj, key, at, problems);

const readMarker = (
  value: unknown,
  at: string,
  problems: Problems
): Marker | undefined => {
  if (!isObject(value)) {
    problems.push(`'${at}' must be an object`);
    return undefined;
  }
  const span = readSpan(value.span, `${at}.span`, problems);
  const kind = oneOf(MARKER_KINDS, value.kind);
  if (!kind) {
    problems.push(`'${at}.kind' is not a known marker kind`);
    return undefined;
  }
  if (!span) return undefined;

  switch (kind) {
    case "staticMethod":
    case "classMethod":
    case "classAttribute":
    case "new":
    case "call":
    case "passModule":
      return { kind, span };
    case "getter":
    case "setter": {
      const name = readOptionalString(value, "name", `${at}.`, problems);
      return name === undefined
        ? { kind, span }
        : { kind, name, span };
    }
    case "signatureText": {
      const text = readString(value, "text", `${at}.`, problems);
      return text === undefined ? undefined : { kind: "signatureText", text, span };
    }
    case "nameOverride": {
      const name = readString(value, "name", `${at}.`, problems);
      return name === undefined ? undefined : { kind: "nameOverride", name, span };
    }
  }
};

const readEach = <T>(
  items: readonly unknown[],
  at: string,
  problems: Problems,
  read: (value: unknown, at: string, problems: Problems) => T | undefined
): readonly T[] => {
  const values: T[] = [];
  items.forEach((item, i) => {
    const value = read(item, `${at}[${i}]`, problems);
    if (value !== undefined) values.push(value);
  });
  return values;
};

const readDeclaration = (
  value: unknown,
  problems: Problems
): Declaration | undefined => {
  if (!isObject(value)) {
    problems.push("must be an object");
    return undefined;
  }

  const name = readString(value, "name", "", problems);
  const nameSpan = readSpan(value.nameSpan, "nameSpan", problems);
  const span = readSpan(value.span, "span", problems);

  const owner =
    value.owner === undefined ? "type" : oneOf(OWNERS, value.owner);
  if (!owner) {
    problems.push(`'owner' must be one of: ${OWNERS.join(", ")}`);
  }

  const receiver = readReceiver(value.receiver, problems);
  const parameters = readEach(
    readArray(value, "parameters", "", problems),
    "parameters",
    problems,
    readParameter
  );
  const genericParameters = readEach(
    readArray(value, "genericParameters", "", problems),
    "genericParameters",
    problems,
    readGenericParameter
  );
  const returnType =
    value.returnType === undefined
      ? undefined
      : readTypeRef(value.returnType, "returnType", problems);
  const markers = readEach(
    readArray(value, "markers", "", problems),
    "markers",
    problems,
    readMarker
  );

  if (problems.length > 0 || name === undefined || !nameSpan || !span || !owner) {
    return undefined;
  }

  return {
    name,
    nameSpan,
    span,
    owner,
    receiver,
    parameters,
    genericParameters,
    returnType,
    markers,
  };
};

const inputError = (
  code: Diagnostic["code"],
  message: string
): Diagnostic => ({
  code,
  message,
  severity: "error",
  location: undefined,
});

/**
 * Validate parsed JSON as a declaration batch.
 */
export const parseDeclarationBatch = (
  data: unknown,
  fileName: string
): Result<readonly Declaration[], Diagnostic[]> => {
  if (!isObject(data)) {
    return {
      ok: false,
      error: [
        inputError(
          "SIG9004",
          `Batch file must be an object, got ${Array.isArray(data) ? "array" : typeof data}`
        ),
      ],
    };
  }

  const entries = data.declarations;
  if (!Array.isArray(entries)) {
    return {
      ok: false,
      error: [
        inputError(
          "SIG9005",
          `Missing or invalid 'declarations' field in ${fileName}`
        ),
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const declarations: Declaration[] = [];

  entries.forEach((entry: unknown, index) => {
    const problems: Problems = [];
    const declaration = readDeclaration(entry, problems);
    for (const problem of problems) {
      diagnostics.push(
        inputError(
          "SIG9006",
          `Invalid declaration ${index} in ${fileName}: ${problem}`
        )
      );
    }
    if (declaration) {
      declarations.push(declaration);
    }
  });

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return { ok: true, value: declarations };
};

/**
 * Load and parse a declaration batch file.
 *
 * @param filePath - Path to the JSON batch file
 */
export const loadDeclarationBatch = (
  filePath: string
): Result<readonly Declaration[], Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [inputError("SIG9001", `Batch file not found: ${filePath}`)],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [inputError("SIG9002", `Failed to read batch file: ${err}`)],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return {
      ok: false,
      error: [inputError("SIG9003", `Invalid JSON in batch file: ${err}`)],
    };
  }

  return parseDeclarationBatch(parsed, path.basename(filePath));
};
