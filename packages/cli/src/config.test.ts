/**
 * Tests for configuration loading and resolution
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { findConfig, loadConfig, resolveConfig } from "./config.js";
import type { MethodcheckConfig } from "./types.js";

describe("Config", () => {
  describe("resolveConfig", () => {
    it("should use defaults for an empty config", () => {
      const result = resolveConfig({}, {}, "/project");
      expect(result.projectRoot).to.equal("/project");
      expect(result.batchFiles).to.deep.equal([]);
      expect(result.validation).to.deep.equal({
        constructorName: "__new__",
        moduleTypeName: "Module",
      });
      expect(result.verbose).to.be.false;
      expect(result.quiet).to.be.false;
      expect(result.json).to.be.false;
    });

    it("should use config values as defaults", () => {
      const config: MethodcheckConfig = {
        constructorName: "create",
        moduleTypeName: "HostModule",
        batch: "decls/batch.json",
      };

      const result = resolveConfig(config, {}, "/project");
      expect(result.validation).to.deep.equal({
        constructorName: "create",
        moduleTypeName: "HostModule",
      });
      expect(result.batchFiles).to.deep.equal(["/project/decls/batch.json"]);
    });

    it("should accept a list of batch files", () => {
      const result = resolveConfig(
        { batch: ["a.json", "nested/b.json"] },
        {},
        "/project"
      );
      expect(result.batchFiles).to.deep.equal([
        "/project/a.json",
        "/project/nested/b.json",
      ]);
    });

    it("should override config with CLI options", () => {
      const result = resolveConfig(
        { constructorName: "create", moduleTypeName: "HostModule" },
        { constructorName: "build", verbose: true, json: true },
        "/project"
      );
      expect(result.validation).to.deep.equal({
        constructorName: "build",
        moduleTypeName: "HostModule",
      });
      expect(result.verbose).to.be.true;
      expect(result.json).to.be.true;
    });

    it("should resolve CLI inputs against the working directory", () => {
      const result = resolveConfig(
        { batch: "ignored.json" },
        {},
        "/project",
        ["batch.json"],
        "/project/sub"
      );
      expect(result.batchFiles).to.deep.equal(["/project/sub/batch.json"]);
    });
  });

  describe("loadConfig and findConfig", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "methodcheck-config-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should load a valid config file", () => {
      const configPath = path.join(tempDir, "methodcheck.json");
      fs.writeFileSync(
        configPath,
        JSON.stringify({ constructorName: "create", batch: ["a.json"] })
      );

      const result = loadConfig(configPath);
      expect(result.ok).to.be.true;
      if (result.ok) {
        expect(result.value.constructorName).to.equal("create");
        expect(result.value.batch).to.deep.equal(["a.json"]);
        expect(result.value.moduleTypeName).to.be.undefined;
      }
    });

    it("should report a missing config file", () => {
      const configPath = path.join(tempDir, "missing.json");
      const result = loadConfig(configPath);
      expect(result).to.deep.equal({
        ok: false,
        error: `Config file not found: ${configPath}`,
      });
    });

    it("should report invalid JSON", () => {
      const configPath = path.join(tempDir, "methodcheck.json");
      fs.writeFileSync(configPath, "{ not json");

      const result = loadConfig(configPath);
      expect(result.ok).to.be.false;
      if (!result.ok) {
        expect(result.error).to.match(/^Failed to parse methodcheck\.json: /);
      }
    });

    it("should reject a non-string constructor name", () => {
      const configPath = path.join(tempDir, "methodcheck.json");
      fs.writeFileSync(configPath, JSON.stringify({ constructorName: 7 }));

      expect(loadConfig(configPath)).to.deep.equal({
        ok: false,
        error: "methodcheck.json: 'constructorName' must be a string",
      });
    });

    it("should reject a malformed batch entry", () => {
      const configPath = path.join(tempDir, "methodcheck.json");
      fs.writeFileSync(configPath, JSON.stringify({ batch: ["a.json", 3] }));

      expect(loadConfig(configPath)).to.deep.equal({
        ok: false,
        error: "methodcheck.json: 'batch' must be a path or a list of paths",
      });
    });

    it("should reject a config that is not an object", () => {
      const configPath = path.join(tempDir, "methodcheck.json");
      fs.writeFileSync(configPath, "[]");

      expect(loadConfig(configPath)).to.deep.equal({
        ok: false,
        error: "methodcheck.json must contain an object",
      });
    });

    it("should find a config file in a parent directory", () => {
      const configPath = path.join(tempDir, "methodcheck.json");
      fs.writeFileSync(configPath, "{}");
      const nested = path.join(tempDir, "a", "b");
      fs.mkdirSync(nested, { recursive: true });

      expect(findConfig(nested)).to.equal(configPath);
    });
  });
});
