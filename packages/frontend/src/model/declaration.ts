/**
 * Declaration model - one annotated function declaration under validation
 *
 * Values are produced by the syntax front end with every span resolved.
 * Nothing in the engine mutates a declaration.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { Marker } from "./markers.js";

export type DeclarationOwner = "type" | "module";

export type ReceiverKind = "byRef" | "byMutRef" | "byValue";

export type Receiver = {
  readonly kind: ReceiverKind;
  readonly span: SourceLocation;
};

/**
 * Parameter type as written. An `opaque` type is an opaque-existential
 * ("any type satisfying <bound>") form.
 */
export type TypeRef =
  | {
      readonly kind: "path";
      readonly text: string;
      readonly isReference: boolean;
      readonly span: SourceLocation;
    }
  | {
      readonly kind: "opaque";
      readonly bound: string;
      readonly span: SourceLocation;
    };

export type DeclarationParameter = {
  readonly name: string;
  readonly type: TypeRef;
  readonly hasDefault: boolean;
  readonly span: SourceLocation;
};

export type GenericParameter = {
  readonly name: string;
  readonly span: SourceLocation;
};

export type Declaration = {
  readonly name: string;
  readonly nameSpan: SourceLocation;
  readonly span: SourceLocation;
  readonly owner: DeclarationOwner;
  readonly receiver?: Receiver;
  readonly parameters: readonly DeclarationParameter[];
  readonly genericParameters: readonly GenericParameter[];
  readonly returnType?: TypeRef;
  readonly markers: readonly Marker[];
};

/**
 * Render a type reference the way it was written
 */
export const typeRefText = (type: TypeRef): string => {
  switch (type.kind) {
    case "path":
      return type.isReference ? `&${type.text}` : type.text;
    case "opaque":
      return `impl ${type.bound}`;
  }
};

/**
 * Last path segment of a type, ignoring generic arguments
 * (`crate::types::Module<'a>` → `Module`)
 */
export const typePathTail = (type: TypeRef): string | undefined => {
  if (type.kind !== "path") return undefined;
  const withoutArgs = type.text.split("<")[0] ?? "";
  const segments = withoutArgs.split("::");
  return segments[segments.length - 1]?.trim();
};
