/**
 * Role classifier - decides the method role of a declaration
 *
 * An explicit role marker is authoritative. Without one, only two shapes
 * are inferred: a receiver means an instance method, and a bare
 * receiver-less declaration with the reserved constructor name means a
 * constructor. Anything else receiver-less must say it is static.
 */

import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Result, ok, error } from "../types/result.js";
import type { Declaration } from "../model/declaration.js";
import { type MethodRole, ROLE_FOR_MARKER } from "../model/roles.js";
import type { ValidationOptions } from "../options.js";
import type { ResolvedMetadata } from "./metadata-resolver.js";

const isConstructorShape = (
  declaration: Declaration,
  options: ValidationOptions
): boolean =>
  declaration.name === options.constructorName &&
  declaration.parameters.length === 0;

export const classifyRole = (
  declaration: Declaration,
  metadata: ResolvedMetadata,
  options: ValidationOptions
): Result<MethodRole, Diagnostic> => {
  if (declaration.owner === "module") {
    return ok("function");
  }

  if (metadata.roleMarker) {
    return ok(ROLE_FOR_MARKER[metadata.roleMarker.kind]);
  }

  if (declaration.receiver) {
    return ok("instance");
  }

  if (isConstructorShape(declaration, options)) {
    return ok("new");
  }

  return error(
    createDiagnostic(
      "SIG2001",
      "error",
      "static method needs the static-method designation",
      declaration.nameSpan,
      "add a static-method marker, or give the method a receiver"
    )
  );
};
