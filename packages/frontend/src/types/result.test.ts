/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, flatMap, collectResults, type Result } from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      expect(ok<number, string>(42)).to.deep.equal({ ok: true, value: 42 });
    });

    it("should create error result", () => {
      expect(error<number, string>("Something went wrong")).to.deep.equal({
        ok: false,
        error: "Something went wrong",
      });
    });
  });

  describe("flatMap", () => {
    it("should flatMap ok value", () => {
      const mapped = flatMap(ok<number, string>(5), (x) =>
        ok<string, string>(x.toString())
      );
      expect(mapped).to.deep.equal({ ok: true, value: "5" });
    });

    it("should handle flatMap returning error", () => {
      const mapped = flatMap(
        ok<number, string>(5),
        (x): Result<number, string> => (x > 10 ? ok(x) : error("Too small"))
      );
      expect(mapped).to.deep.equal({ ok: false, error: "Too small" });
    });

    it("should not call the function for an error", () => {
      let called = false;
      const mapped = flatMap(error<number, string>("Error"), (x) => {
        called = true;
        return ok<number, string>(x);
      });
      expect(called).to.be.false;
      expect(mapped).to.deep.equal({ ok: false, error: "Error" });
    });
  });

  describe("collectResults", () => {
    it("should collect every value when all succeed", () => {
      const results: Result<number, readonly string[]>[] = [ok(1), ok(2)];
      expect(collectResults(results)).to.deep.equal({
        ok: true,
        value: [1, 2],
      });
    });

    it("should keep every error in element order", () => {
      const results: Result<number, readonly string[]>[] = [
        error(["a", "b"]),
        ok(1),
        error(["c"]),
      ];
      expect(collectResults(results)).to.deep.equal({
        ok: false,
        error: ["a", "b", "c"],
      });
    });

    it("should succeed with an empty list", () => {
      expect(collectResults<number, string>([])).to.deep.equal({
        ok: true,
        value: [],
      });
    });
  });
});
