/**
 * Auxiliary option applicability per role
 */

import {
  type Diagnostic,
  type SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";
import type { MethodRole } from "../model/roles.js";
import type { ResolvedMetadata } from "../resolution/metadata-resolver.js";

type OptionRule =
  | { readonly allowed: true }
  | {
      readonly allowed: false;
      readonly reject: (span: SourceLocation) => Diagnostic;
    };

const ALLOWED: OptionRule = { allowed: true };

const signatureOnProperty = (member: string): OptionRule => ({
  allowed: false,
  reject: (span) =>
    createDiagnostic(
      "SIG5002",
      "error",
      `signature text not allowed on a ${member}`,
      span,
      "property-style members have no call signature"
    ),
});

const SIGNATURE_TEXT_RULES: Readonly<Record<MethodRole, OptionRule>> = {
  instance: ALLOWED,
  static: ALLOWED,
  classMethod: ALLOWED,
  call: ALLOWED,
  function: ALLOWED,
  new: {
    allowed: false,
    reject: (span) =>
      createDiagnostic(
        "SIG5001",
        "error",
        "signature text not allowed on a constructor; put it on the enclosing type definition instead",
        span
      ),
  },
  getter: signatureOnProperty("getter"),
  setter: signatureOnProperty("setter"),
  classAttribute: signatureOnProperty("class attribute"),
};

const nameOverrideRule = (role: MethodRole): OptionRule =>
  role === "new"
    ? {
        allowed: false,
        reject: (span) =>
          createDiagnostic(
            "SIG5003",
            "error",
            "name override not allowed on a constructor",
            span
          ),
      }
    : ALLOWED;

const passModuleRule = (role: MethodRole): OptionRule =>
  role === "function"
    ? ALLOWED
    : {
        allowed: false,
        reject: (span) =>
          createDiagnostic(
            "SIG5004",
            "error",
            "pass-module is only valid on module functions",
            span
          ),
      };

const check = (
  rule: OptionRule,
  marker: { readonly span: SourceLocation } | undefined
): readonly Diagnostic[] =>
  marker && !rule.allowed ? [rule.reject(marker.span)] : [];

/**
 * Options are checked in marker-kind order: signature text, name, pass-module
 */
export const validateAuxiliaryOptions = (
  role: MethodRole,
  metadata: ResolvedMetadata
): readonly Diagnostic[] => [
  ...check(SIGNATURE_TEXT_RULES[role], metadata.signatureText),
  ...check(nameOverrideRule(role), metadata.nameOverride),
  ...check(passModuleRule(role), metadata.passModule),
];
