/**
 * Metadata resolver - collapses attached markers into one role marker
 * plus auxiliary options.
 *
 * Markers are scanned once, in source order. The first role marker wins;
 * a second one is a conflict anchored at the second marker.
 */

import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Result, ok, error } from "../types/result.js";
import type { Declaration } from "../model/declaration.js";
import {
  type RoleMarker,
  type SignatureTextMarker,
  type NameOverrideMarker,
  type PassModuleMarker,
  type AuxiliaryMarker,
  isRoleMarker,
  MARKER_DISPLAY_NAMES,
} from "../model/markers.js";

export type ResolvedMetadata = {
  readonly roleMarker?: RoleMarker;
  readonly signatureText?: SignatureTextMarker;
  readonly nameOverride?: NameOverrideMarker;
  readonly passModule?: PassModuleMarker;
};

type MutableMetadata = {
  -readonly [K in keyof ResolvedMetadata]: ResolvedMetadata[K];
};

const secondMethodType = (
  marker: RoleMarker,
  first: RoleMarker
): Diagnostic =>
  createDiagnostic(
    "SIG1001",
    "error",
    "cannot specify a second method type",
    marker.span,
    `'${MARKER_DISPLAY_NAMES[first.kind]}' already selects the method type`,
    [first.span]
  );

const repeatedOption = (
  marker: AuxiliaryMarker,
  first: AuxiliaryMarker
): Diagnostic =>
  createDiagnostic(
    "SIG1002",
    "error",
    `'${MARKER_DISPLAY_NAMES[marker.kind]}' may only be specified once`,
    marker.span,
    undefined,
    [first.span]
  );

const markerOnModuleFunction = (marker: RoleMarker): Diagnostic =>
  createDiagnostic(
    "SIG1003",
    "error",
    "method-type markers are only valid inside a type definition",
    marker.span,
    `remove '${MARKER_DISPLAY_NAMES[marker.kind]}' from the module function`
  );

/**
 * Record an auxiliary marker, or report it when the slot is taken
 */
const recordAuxiliary = (
  resolved: MutableMetadata,
  marker: AuxiliaryMarker
): Diagnostic | undefined => {
  switch (marker.kind) {
    case "signatureText":
      if (resolved.signatureText) {
        return repeatedOption(marker, resolved.signatureText);
      }
      resolved.signatureText = marker;
      return undefined;
    case "nameOverride":
      if (resolved.nameOverride) {
        return repeatedOption(marker, resolved.nameOverride);
      }
      resolved.nameOverride = marker;
      return undefined;
    case "passModule":
      if (resolved.passModule) {
        return repeatedOption(marker, resolved.passModule);
      }
      resolved.passModule = marker;
      return undefined;
  }
};

/**
 * Resolve the markers attached to a declaration.
 * Stops at the first conflicting or repeated marker. A method-type
 * marker on a module function is only reported once the scan has found
 * no second one.
 */
export const resolveMetadata = (
  declaration: Declaration
): Result<ResolvedMetadata, Diagnostic> => {
  const resolved: MutableMetadata = {};

  for (const marker of declaration.markers) {
    if (isRoleMarker(marker)) {
      if (resolved.roleMarker) {
        return error(secondMethodType(marker, resolved.roleMarker));
      }
      resolved.roleMarker = marker;
      continue;
    }

    const conflict = recordAuxiliary(resolved, marker);
    if (conflict) {
      return error(conflict);
    }
  }

  if (declaration.owner === "module" && resolved.roleMarker) {
    return error(markerOnModuleFunction(resolved.roleMarker));
  }

  return ok(resolved);
};
