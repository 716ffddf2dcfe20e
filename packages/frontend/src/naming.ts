/**
 * Exposed-name resolution
 *
 * Precedence: explicit name override, the constructor name for
 * constructors, a name given on the getter/setter marker, the
 * declaration name minus its get_/set_ prefix, the declaration name.
 */

import type { Declaration } from "./model/declaration.js";
import type { MethodRole } from "./model/roles.js";
import type { ResolvedMetadata } from "./resolution/metadata-resolver.js";
import type { ValidationOptions } from "./options.js";

const ACCESSOR_PREFIXES: Readonly<Partial<Record<MethodRole, string>>> = {
  getter: "get_",
  setter: "set_",
};

const stripAccessorPrefix = (name: string, role: MethodRole): string => {
  const prefix = ACCESSOR_PREFIXES[role];
  if (prefix && name.startsWith(prefix) && name.length > prefix.length) {
    return name.slice(prefix.length);
  }
  return name;
};

export const resolveExposedName = (
  declaration: Declaration,
  role: MethodRole,
  metadata: ResolvedMetadata,
  options: ValidationOptions
): string => {
  if (metadata.nameOverride) {
    return metadata.nameOverride.name;
  }

  if (role === "new") {
    return options.constructorName;
  }

  const marker = metadata.roleMarker;
  if (
    (marker?.kind === "getter" || marker?.kind === "setter") &&
    marker.name !== undefined
  ) {
    return marker.name;
  }

  return stripAccessorPrefix(declaration.name, role);
};
