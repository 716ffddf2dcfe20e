/**
 * Method roles and the validated descriptor handed to bridge generation
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { ReceiverKind, TypeRef } from "./declaration.js";
import type { RoleMarker } from "./markers.js";

export type MethodRole =
  | "instance"
  | "static"
  | "classMethod"
  | "classAttribute"
  | "getter"
  | "setter"
  | "new"
  | "call"
  | "function";

/**
 * Role selected by each role marker
 */
export const ROLE_FOR_MARKER: Readonly<Record<RoleMarker["kind"], MethodRole>> =
  {
    staticMethod: "static",
    classMethod: "classMethod",
    classAttribute: "classAttribute",
    getter: "getter",
    setter: "setter",
    new: "new",
    call: "call",
  };

export const ROLE_DISPLAY_NAMES: Readonly<Record<MethodRole, string>> = {
  instance: "instance method",
  static: "static method",
  classMethod: "class method",
  classAttribute: "class attribute",
  getter: "getter",
  setter: "setter",
  new: "constructor",
  call: "call protocol method",
  function: "module function",
};

export type DescriptorParameter = {
  readonly name: string;
  readonly type: TypeRef;
  readonly isOptional: boolean;
};

export type MethodDescriptor = {
  readonly role: MethodRole;
  readonly name: string;
  readonly exposedName: string;
  readonly receiver?: ReceiverKind;
  readonly parameters: readonly DescriptorParameter[];
  readonly signatureText?: string;
  readonly passModule: boolean;
  readonly span: SourceLocation;
};
