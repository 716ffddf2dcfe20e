/**
 * Tests for exposed-name resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { resolveExposedName } from "./naming.js";
import { resolveMetadata } from "./resolution/metadata-resolver.js";
import { DEFAULT_VALIDATION_OPTIONS } from "./options.js";
import type { Declaration } from "./model/declaration.js";
import type { MethodRole } from "./model/roles.js";
import { at, declaration, markers, receiver } from "./test-harness.js";

const exposedName = (decl: Declaration, role: MethodRole): string => {
  const metadata = resolveMetadata(decl);
  if (!metadata.ok) {
    throw new Error(`unexpected marker error: ${metadata.error.message}`);
  }
  return resolveExposedName(decl, role, metadata.value, DEFAULT_VALIDATION_OPTIONS);
};

describe("Exposed names", () => {
  it("should use the declaration name by default", () => {
    expect(exposedName(declaration({ name: "compute" }), "static")).to.equal(
      "compute"
    );
  });

  it("should prefer an explicit name override", () => {
    const decl = declaration({
      name: "get_size",
      receiver: receiver(),
      markers: [
        markers.getter(at(1, 3, 8), "length"),
        markers.nameOverride(at(1, 12, 10), "size"),
      ],
    });
    expect(exposedName(decl, "getter")).to.equal("size");
  });

  it("should use the name given on a getter or setter marker", () => {
    const decl = declaration({
      name: "set_size",
      receiver: receiver(),
      markers: [markers.setter(at(1, 3, 8), "length")],
    });
    expect(exposedName(decl, "setter")).to.equal("length");
  });

  it("should strip accessor prefixes", () => {
    expect(exposedName(declaration({ name: "get_size" }), "getter")).to.equal(
      "size"
    );
    expect(exposedName(declaration({ name: "set_size" }), "setter")).to.equal(
      "size"
    );
  });

  it("should keep a name that is only the prefix", () => {
    expect(exposedName(declaration({ name: "get_" }), "getter")).to.equal(
      "get_"
    );
  });

  it("should not strip prefixes for other roles", () => {
    expect(exposedName(declaration({ name: "get_size" }), "instance")).to.equal(
      "get_size"
    );
    expect(exposedName(declaration({ name: "set_size" }), "getter")).to.equal(
      "set_size"
    );
  });

  it("should expose constructors under the constructor name", () => {
    const decl = declaration({
      name: "create",
      markers: [markers.new(at(1, 3, 6))],
    });
    expect(exposedName(decl, "new")).to.equal("__new__");
  });
});
