/**
 * Shape validator - per-role receiver and parameter rules
 *
 * Checks run in a fixed order so that output is reproducible:
 * receiver, parameter arity, parameter forms, generics, auxiliary options.
 */

import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Declaration, typePathTail } from "../model/declaration.js";
import { type MethodRole, ROLE_DISPLAY_NAMES } from "../model/roles.js";
import type { ResolvedMetadata } from "../resolution/metadata-resolver.js";
import type { ValidationOptions } from "../options.js";
import { validateGenericParameters, validateParameterForms } from "./forms.js";
import { validateAuxiliaryOptions } from "./auxiliary-options.js";

type ShapeContext = {
  readonly metadata: ResolvedMetadata;
  readonly options: ValidationOptions;
};

type RoleShape = {
  readonly receiver: "required" | "forbidden";
  readonly parameters: (
    declaration: Declaration,
    context: ShapeContext
  ) => readonly Diagnostic[];
};

const anyParameters = (): readonly Diagnostic[] => [];

/**
 * Reject all parameters, reporting once at the first one
 */
const noParameters =
  (message: string) =>
  (declaration: Declaration): readonly Diagnostic[] => {
    const first = declaration.parameters[0];
    return first
      ? [createDiagnostic("SIG3003", "error", message, first.span)]
      : [];
  };

const setterParameters = (declaration: Declaration): readonly Diagnostic[] => {
  const [, extra] = declaration.parameters;
  if (declaration.parameters.length === 0) {
    return [
      createDiagnostic(
        "SIG3004",
        "error",
        "setter needs exactly one value argument",
        declaration.nameSpan
      ),
    ];
  }
  if (extra) {
    return [
      createDiagnostic(
        "SIG3004",
        "error",
        "setter needs exactly one value argument",
        extra.span
      ),
    ];
  }
  return [];
};

const classMethodParameters = (
  declaration: Declaration
): readonly Diagnostic[] =>
  declaration.parameters.length === 0
    ? [
        createDiagnostic(
          "SIG3005",
          "error",
          "class method needs the type object as its first argument",
          declaration.nameSpan
        ),
      ]
    : [];

const moduleFunctionParameters = (
  declaration: Declaration,
  { metadata, options }: ShapeContext
): readonly Diagnostic[] => {
  if (!metadata.passModule) {
    return [];
  }

  const message = `expected a reference to '${options.moduleTypeName}' as first argument with pass-module`;
  const first = declaration.parameters[0];
  if (!first) {
    return [createDiagnostic("SIG3006", "error", message, declaration.span)];
  }

  const takesModule =
    first.type.kind === "path" &&
    first.type.isReference &&
    typePathTail(first.type) === options.moduleTypeName;
  return takesModule
    ? []
    : [createDiagnostic("SIG3006", "error", message, first.type.span)];
};

const ROLE_SHAPES: Readonly<Record<MethodRole, RoleShape>> = {
  instance: { receiver: "required", parameters: anyParameters },
  static: { receiver: "forbidden", parameters: anyParameters },
  classMethod: { receiver: "forbidden", parameters: classMethodParameters },
  classAttribute: {
    receiver: "forbidden",
    parameters: noParameters("class attribute methods cannot take arguments"),
  },
  getter: {
    receiver: "required",
    parameters: noParameters("getter methods cannot take arguments"),
  },
  setter: { receiver: "required", parameters: setterParameters },
  new: { receiver: "forbidden", parameters: anyParameters },
  call: { receiver: "required", parameters: anyParameters },
  function: { receiver: "forbidden", parameters: moduleFunctionParameters },
};

const validateReceiver = (
  declaration: Declaration,
  role: MethodRole
): readonly Diagnostic[] => {
  const rule = ROLE_SHAPES[role].receiver;

  if (rule === "forbidden" && declaration.receiver) {
    return [
      createDiagnostic(
        "SIG3001",
        "error",
        "unexpected receiver",
        declaration.receiver.span,
        `a ${ROLE_DISPLAY_NAMES[role]} does not take a receiver`
      ),
    ];
  }

  if (rule === "required" && !declaration.receiver) {
    return [
      createDiagnostic(
        "SIG3002",
        "error",
        `expected receiver for ${ROLE_DISPLAY_NAMES[role]}`,
        declaration.nameSpan
      ),
    ];
  }

  return [];
};

/**
 * Validate a declaration's shape against its resolved role.
 * Reports every independent violation.
 */
export const validateShape = (
  declaration: Declaration,
  role: MethodRole,
  metadata: ResolvedMetadata,
  options: ValidationOptions
): readonly Diagnostic[] => [
  ...validateReceiver(declaration, role),
  ...ROLE_SHAPES[role].parameters(declaration, { metadata, options }),
  ...validateParameterForms(declaration),
  ...validateGenericParameters(declaration),
  ...validateAuxiliaryOptions(role, metadata),
];
