/**
 * Validation orchestrator - resolves, classifies and validates declarations
 *
 * Within one declaration, metadata resolution and role classification
 * gate the shape checks. Across a batch every declaration is validated;
 * one declaration's failure never affects another's diagnostics.
 */

import {
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnosticsCollector,
  addDiagnostics,
} from "../types/diagnostic.js";
import { type Result, ok, error, flatMap } from "../types/result.js";
import type { Declaration } from "../model/declaration.js";
import type { MethodDescriptor, MethodRole } from "../model/roles.js";
import {
  type ResolvedMetadata,
  resolveMetadata,
} from "../resolution/metadata-resolver.js";
import { classifyRole } from "../resolution/role-classifier.js";
import {
  type ValidationOptions,
  resolveValidationOptions,
} from "../options.js";
import { resolveExposedName } from "../naming.js";
import { validateShape } from "./shape-validator.js";

/**
 * Result of validating a batch of declarations
 */
export type ValidationResult = {
  readonly ok: boolean;
  readonly descriptors: readonly MethodDescriptor[];
  readonly diagnostics: readonly Diagnostic[];
};

type Classified = {
  readonly metadata: ResolvedMetadata;
  readonly role: MethodRole;
};

const classify = (
  declaration: Declaration,
  options: ValidationOptions
): Result<Classified, Diagnostic> =>
  flatMap(
    resolveMetadata(declaration),
    (metadata): Result<Classified, Diagnostic> => {
      const role = classifyRole(declaration, metadata, options);
      return role.ok ? ok({ metadata, role: role.value }) : role;
    }
  );

const buildDescriptor = (
  declaration: Declaration,
  { metadata, role }: Classified,
  options: ValidationOptions
): MethodDescriptor => {
  const passModule = metadata.passModule !== undefined;
  // The module argument is supplied by the bridge, not the caller
  const exposedParameters = passModule
    ? declaration.parameters.slice(1)
    : declaration.parameters;

  return {
    role,
    name: declaration.name,
    exposedName: resolveExposedName(declaration, role, metadata, options),
    receiver: declaration.receiver?.kind,
    parameters: exposedParameters.map((parameter) => ({
      name: parameter.name,
      type: parameter.type,
      isOptional: parameter.hasDefault,
    })),
    signatureText: metadata.signatureText?.text,
    passModule,
    span: declaration.span,
  };
};

/**
 * Validate one declaration into a method descriptor
 */
export const validateDeclaration = (
  declaration: Declaration,
  options: Partial<ValidationOptions> = {}
): Result<MethodDescriptor, readonly Diagnostic[]> => {
  const resolvedOptions = resolveValidationOptions(options);
  const classified = classify(declaration, resolvedOptions);
  if (!classified.ok) {
    return error([classified.error]);
  }

  const diagnostics = validateShape(
    declaration,
    classified.value.role,
    classified.value.metadata,
    resolvedOptions
  );
  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok(buildDescriptor(declaration, classified.value, resolvedOptions));
};

type BatchState = {
  readonly collector: DiagnosticsCollector;
  readonly descriptors: readonly MethodDescriptor[];
};

/**
 * Validate a batch of declarations in source order
 */
export const validateDeclarations = (
  declarations: readonly Declaration[],
  options: Partial<ValidationOptions> = {}
): ValidationResult => {
  const resolvedOptions = resolveValidationOptions(options);

  const initial: BatchState = {
    collector: createDiagnosticsCollector(),
    descriptors: [],
  };

  const final = declarations.reduce((state, declaration): BatchState => {
    const result = validateDeclaration(declaration, resolvedOptions);
    return result.ok
      ? { ...state, descriptors: [...state.descriptors, result.value] }
      : { ...state, collector: addDiagnostics(state.collector, result.error) };
  }, initial);

  return {
    ok: !final.collector.hasErrors,
    descriptors: final.descriptors,
    diagnostics: final.collector.diagnostics,
  };
};
