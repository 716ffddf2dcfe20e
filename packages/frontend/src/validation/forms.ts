/**
 * Unsupported declaration forms
 *
 * The bridge needs one concrete exposed signature per declaration, so
 * generic parameters and opaque-existential parameter types are rejected
 * outright for every role.
 */

import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Declaration, typeRefText } from "../model/declaration.js";

export const validateParameterForms = (
  declaration: Declaration
): readonly Diagnostic[] =>
  declaration.parameters
    .filter((parameter) => parameter.type.kind === "opaque")
    .map((parameter) =>
      createDiagnostic(
        "SIG4002",
        "error",
        "opaque-existential parameter types not supported",
        parameter.type.span,
        `use a concrete type for '${parameter.name}' instead of '${typeRefText(parameter.type)}'`
      )
    );

export const validateGenericParameters = (
  declaration: Declaration
): readonly Diagnostic[] => {
  const first = declaration.genericParameters[0];
  return first
    ? [
        createDiagnostic(
          "SIG4001",
          "error",
          "generic type parameters not supported",
          first.span
        ),
      ]
    : [];
};
