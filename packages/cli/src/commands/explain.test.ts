/**
 * Tests for the explain command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { explainCode } from "./explain.js";

describe("Explain Command", () => {
  it("should describe a known code with its category", () => {
    expect(explainCode("SIG3004")).to.deep.equal({
      ok: true,
      value:
        "SIG3004 (structuralShape): A setter takes exactly one argument: the value being assigned.",
    });
  });

  it("should accept lower-case codes", () => {
    const result = explainCode("sig5004");
    expect(result.ok).to.be.true;
    if (result.ok) {
      expect(result.value).to.equal(
        "SIG5004 (optionApplicability): pass-module only applies to functions exposed on a module."
      );
    }
  });

  it("should reject an unknown code", () => {
    expect(explainCode("SIG0000")).to.deep.equal({
      ok: false,
      error: "Unknown diagnostic code 'SIG0000'",
    });
  });
});
