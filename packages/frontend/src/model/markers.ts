/**
 * Metadata markers attached to a declaration
 *
 * Markers arrive already decoded from annotation syntax; the engine only
 * sees their kind, payload and span.
 */

import type { SourceLocation } from "../types/diagnostic.js";

export type RoleMarker =
  | { readonly kind: "staticMethod"; readonly span: SourceLocation }
  | { readonly kind: "classMethod"; readonly span: SourceLocation }
  | { readonly kind: "classAttribute"; readonly span: SourceLocation }
  | {
      readonly kind: "getter";
      readonly name?: string;
      readonly span: SourceLocation;
    }
  | {
      readonly kind: "setter";
      readonly name?: string;
      readonly span: SourceLocation;
    }
  | { readonly kind: "new"; readonly span: SourceLocation }
  | { readonly kind: "call"; readonly span: SourceLocation };

export type SignatureTextMarker = {
  readonly kind: "signatureText";
  readonly text: string;
  readonly span: SourceLocation;
};

export type NameOverrideMarker = {
  readonly kind: "nameOverride";
  readonly name: string;
  readonly span: SourceLocation;
};

export type PassModuleMarker = {
  readonly kind: "passModule";
  readonly span: SourceLocation;
};

export type AuxiliaryMarker =
  | SignatureTextMarker
  | NameOverrideMarker
  | PassModuleMarker;

export type Marker = RoleMarker | AuxiliaryMarker;

export type MarkerKind = Marker["kind"];

export const ROLE_MARKER_KINDS: readonly RoleMarker["kind"][] = [
  "staticMethod",
  "classMethod",
  "classAttribute",
  "getter",
  "setter",
  "new",
  "call",
];

export const AUXILIARY_MARKER_KINDS: readonly AuxiliaryMarker["kind"][] = [
  "signatureText",
  "nameOverride",
  "passModule",
];

const ROLE_MARKER_KIND_SET: ReadonlySet<MarkerKind> = new Set(
  ROLE_MARKER_KINDS
);

export const isRoleMarker = (marker: Marker): marker is RoleMarker =>
  ROLE_MARKER_KIND_SET.has(marker.kind);

/**
 * Name of a marker as shown in messages
 */
export const MARKER_DISPLAY_NAMES: Readonly<Record<MarkerKind, string>> = {
  staticMethod: "static-method",
  classMethod: "class-method",
  classAttribute: "class-attribute",
  getter: "getter",
  setter: "setter",
  new: "new",
  call: "call",
  signatureText: "signature-text",
  nameOverride: "name",
  passModule: "pass-module",
};
