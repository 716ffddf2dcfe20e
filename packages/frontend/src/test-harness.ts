/**
 * Builders for declarations used across the engine tests.
 *
 * Spans are laid out as if each declaration sat on its own line of
 * `src/lib.src`, so every sub-element gets a distinct location.
 */

import type { SourceLocation } from "./types/diagnostic.js";
import type {
  Declaration,
  DeclarationParameter,
  GenericParameter,
  Receiver,
  ReceiverKind,
} from "./model/declaration.js";
import type { Marker } from "./model/markers.js";

export const at = (
  line: number,
  column: number,
  length = 1
): SourceLocation => ({ file: "src/lib.src", line, column, length });

export const receiver = (
  kind: ReceiverKind = "byRef",
  span: SourceLocation = at(1, 12, 5)
): Receiver => ({ kind, span });

/**
 * `name: type` starting at the given column; the type span follows the colon
 */
export const param = (
  name: string,
  type: string,
  column: number,
  options: {
    readonly line?: number;
    readonly isReference?: boolean;
    readonly hasDefault?: boolean;
  } = {}
): DeclarationParameter => {
  const line = options.line ?? 1;
  const typeColumn = column + name.length + 2;
  return {
    name,
    type: {
      kind: "path",
      text: type,
      isReference: options.isReference ?? false,
      span: at(line, typeColumn, type.length),
    },
    hasDefault: options.hasDefault ?? false,
    span: at(line, column, typeColumn + type.length - column),
  };
};

export const opaqueParam = (
  name: string,
  bound: string,
  column: number,
  line = 1
): DeclarationParameter => {
  const typeColumn = column + name.length + 2;
  const typeLength = `impl ${bound}`.length;
  return {
    name,
    type: { kind: "opaque", bound, span: at(line, typeColumn, typeLength) },
    hasDefault: false,
    span: at(line, column, typeColumn + typeLength - column),
  };
};

export const generic = (
  name: string,
  column: number,
  line = 1
): GenericParameter => ({ name, span: at(line, column, name.length) });

type DeclarationInput = Partial<Declaration> & { readonly line?: number };

/**
 * A type-owned declaration named `method` on line 1 unless overridden
 */
export const declaration = (input: DeclarationInput = {}): Declaration => {
  const { line = 1, ...overrides } = input;
  const name = overrides.name ?? "method";
  return {
    name,
    nameSpan: at(line, 8, name.length),
    span: at(line, 5, 40),
    owner: "type",
    parameters: [],
    genericParameters: [],
    markers: [],
    ...overrides,
  };
};

export const markers = {
  staticMethod: (span: SourceLocation): Marker => ({
    kind: "staticMethod",
    span,
  }),
  classMethod: (span: SourceLocation): Marker => ({ kind: "classMethod", span }),
  classAttribute: (span: SourceLocation): Marker => ({
    kind: "classAttribute",
    span,
  }),
  getter: (span: SourceLocation, name?: string): Marker =>
    name === undefined ? { kind: "getter", span } : { kind: "getter", name, span },
  setter: (span: SourceLocation, name?: string): Marker =>
    name === undefined ? { kind: "setter", span } : { kind: "setter", name, span },
  new: (span: SourceLocation): Marker => ({ kind: "new", span }),
  call: (span: SourceLocation): Marker => ({ kind: "call", span }),
  signatureText: (span: SourceLocation, text: string): Marker => ({
    kind: "signatureText",
    text,
    span,
  }),
  nameOverride: (span: SourceLocation, name: string): Marker => ({
    kind: "nameOverride",
    name,
    span,
  }),
  passModule: (span: SourceLocation): Marker => ({ kind: "passModule", span }),
};
