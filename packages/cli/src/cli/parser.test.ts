/**
 * Tests for CLI argument parser
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { parseArgs } from "./parser.js";

describe("CLI Parser", () => {
  describe("parseArgs", () => {
    describe("Commands", () => {
      it("should parse check command", () => {
        const result = parseArgs(["check"]);
        expect(result.command).to.equal("check");
      });

      it("should parse explain command", () => {
        const result = parseArgs(["explain", "SIG3001"]);
        expect(result.command).to.equal("explain");
        expect(result.inputs).to.deep.equal(["SIG3001"]);
      });

      it("should parse help command from --help", () => {
        const result = parseArgs(["--help"]);
        expect(result.command).to.equal("help");
      });

      it("should parse help command from -h", () => {
        const result = parseArgs(["check", "-h"]);
        expect(result.command).to.equal("help");
        expect(result.inputs).to.deep.equal([]);
      });

      it("should parse version command from --version", () => {
        const result = parseArgs(["--version"]);
        expect(result.command).to.equal("version");
      });

      it("should parse version command from -v", () => {
        const result = parseArgs(["-v"]);
        expect(result.command).to.equal("version");
      });

      it("should return an empty command when none is given", () => {
        const result = parseArgs([]);
        expect(result.command).to.equal("");
        expect(result.inputs).to.deep.equal([]);
      });
    });

    describe("Inputs", () => {
      it("should collect batch files after the command", () => {
        const result = parseArgs(["check", "a.json", "b/c.json"]);
        expect(result.inputs).to.deep.equal(["a.json", "b/c.json"]);
      });

      it("should collect inputs around options", () => {
        const result = parseArgs(["check", "--json", "a.json", "-q", "b.json"]);
        expect(result.inputs).to.deep.equal(["a.json", "b.json"]);
        expect(result.options.json).to.be.true;
        expect(result.options.quiet).to.be.true;
      });
    });

    describe("Options", () => {
      it("should parse --verbose and -V", () => {
        expect(parseArgs(["check", "--verbose"]).options.verbose).to.be.true;
        expect(parseArgs(["check", "-V"]).options.verbose).to.be.true;
      });

      it("should parse --config with its value", () => {
        const result = parseArgs(["check", "--config", "conf/methodcheck.json"]);
        expect(result.options.config).to.equal("conf/methodcheck.json");
        expect(result.inputs).to.deep.equal([]);
      });

      it("should parse -c with its value", () => {
        const result = parseArgs(["check", "-c", "other.json", "batch.json"]);
        expect(result.options.config).to.equal("other.json");
        expect(result.inputs).to.deep.equal(["batch.json"]);
      });

      it("should parse validation overrides", () => {
        const result = parseArgs([
          "check",
          "--constructor-name",
          "create",
          "--module-type",
          "HostModule",
        ]);
        expect(result.options.constructorName).to.equal("create");
        expect(result.options.moduleTypeName).to.equal("HostModule");
      });

      it("should report an option value that is missing", () => {
        const result = parseArgs(["check", "--config"]);
        expect(result.options.config).to.be.undefined;
        expect(result.error).to.equal("Option '--config' requires a value");
      });

      it("should not take the next flag as an option value", () => {
        const result = parseArgs([
          "check",
          "--constructor-name",
          "--json",
          "a.json",
        ]);
        expect(result.options.constructorName).to.be.undefined;
        expect(result.options.json).to.be.true;
        expect(result.inputs).to.deep.equal(["a.json"]);
        expect(result.error).to.equal(
          "Option '--constructor-name' requires a value"
        );
      });

      it("should leave error unset when every option has a value", () => {
        const result = parseArgs(["check", "--module-type", "HostModule"]);
        expect(result.error).to.be.undefined;
      });

      it("should ignore unknown options", () => {
        const result = parseArgs(["check", "--unknown", "a.json"]);
        expect(result.options).to.deep.equal({});
        expect(result.inputs).to.deep.equal(["a.json"]);
      });
    });
  });
});
