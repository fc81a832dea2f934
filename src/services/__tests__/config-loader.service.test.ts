import * as fs from "fs/promises";
import * as path from "path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempDirectory } from "../../__tests__/test-utils";
import { ConfigError, ConfigValidationError } from "../../errors";
import { ConfigLoaderService } from "../config-loader.service";

describe("ConfigLoaderService", () => {
  let configLoader: ConfigLoaderService;
  let tempDir: string;

  async function writeConfig(content: unknown): Promise<string> {
    const configPath = path.join(tempDir, "autosync.json");
    await fs.writeFile(configPath, typeof content === "string" ? content : JSON.stringify(content));
    return configPath;
  }

  beforeEach(async () => {
    configLoader = new ConfigLoaderService();
    tempDir = await createTempDirectory();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe("loadConfigFile", () => {
    it("should load a valid config file", async () => {
      const configPath = await writeConfig({
        path: "./notes",
        remote: "backup",
        branch: "journal",
        debounce: 5,
        push: false,
        ignore: ["drafts/", ".tmp"],
        message: "notes: {ts}",
        debug: true,
      });

      const config = await configLoader.loadConfigFile(configPath);

      expect(config).toEqual({
        path: "./notes",
        remote: "backup",
        branch: "journal",
        debounce: 5,
        push: false,
        ignore: ["drafts/", ".tmp"],
        message: "notes: {ts}",
        debug: true,
      });
    });

    it("should accept an empty object", async () => {
      const configPath = await writeConfig({});

      await expect(configLoader.loadConfigFile(configPath)).resolves.toEqual({});
    });

    it("should report a missing file with its absolute path", async () => {
      const missing = path.join(tempDir, "missing.json");

      const error = await configLoader.loadConfigFile(missing).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ message: `Config file not found: ${missing}`, code: "CONFIG_NOT_FOUND" });
    });

    it("should report malformed JSON", async () => {
      const configPath = await writeConfig("{ not json");

      await expect(configLoader.loadConfigFile(configPath)).rejects.toMatchObject({
        code: "CONFIG_LOAD_FAILED",
      });
    });

    it.each([
      [[], "<root>"],
      [{ remote: 42 }, "remote"],
      [{ path: "" }, "path"],
      [{ push: "yes" }, "push"],
      [{ debug: 1 }, "debug"],
      [{ debounce: -1 }, "debounce"],
      [{ debounce: "2" }, "debounce"],
      [{ ignore: "node_modules" }, "ignore"],
      [{ ignore: ["ok", 3] }, "ignore"],
    ])("should reject %j with an error for '%s'", async (content, field) => {
      const configPath = await writeConfig(content);

      const error = await configLoader.loadConfigFile(configPath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigValidationError);
      expect(error).toMatchObject({ field });
    });
  });

  describe("resolveConfig", () => {
    it("should apply defaults when nothing is given", () => {
      const config = configLoader.resolveConfig({});

      expect(config).toEqual({
        repoPath: process.cwd(),
        remote: "origin",
        debounceMs: 2000,
        push: true,
        ignore: [],
        commitTemplate: "autosync: {ts}",
        debug: false,
      });
      expect(config.branch).toBeUndefined();
    });

    it("should resolve a relative CLI path against the working directory", () => {
      const config = configLoader.resolveConfig({ path: "some/repo" });

      expect(config.repoPath).toBe(path.resolve(process.cwd(), "some/repo"));
    });

    it("should resolve a relative config-file path against the config directory", () => {
      const config = configLoader.resolveConfig({}, { path: "./notes" }, tempDir);

      expect(config.repoPath).toBe(path.join(tempDir, "notes"));
    });

    it("should keep an absolute config-file path", () => {
      const config = configLoader.resolveConfig({}, { path: "/srv/notes" }, tempDir);

      expect(config.repoPath).toBe("/srv/notes");
    });

    it("should let CLI flags win over config-file values", () => {
      const config = configLoader.resolveConfig(
        { remote: "origin", debounce: 0.5, push: true, branch: "main", message: "cli {ts}" },
        { remote: "backup", debounce: 10, push: false, branch: "journal", message: "file {ts}", debug: true },
      );

      expect(config).toMatchObject({
        remote: "origin",
        debounceMs: 500,
        push: true,
        branch: "main",
        commitTemplate: "cli {ts}",
        debug: true,
      });
    });

    it("should fall back to config-file values for unset flags", () => {
      const config = configLoader.resolveConfig({}, { remote: "backup", debounce: 0, push: false });

      expect(config).toMatchObject({ remote: "backup", debounceMs: 0, push: false });
    });

    it("should concatenate ignore lists and drop empty entries", () => {
      const config = configLoader.resolveConfig({ ignore: ["build/", ""] }, { ignore: ["drafts/"] });

      expect(config.ignore).toEqual(["drafts/", "build/"]);
    });

    it("should reject a negative or non-numeric debounce", () => {
      expect(() => configLoader.resolveConfig({ debounce: -2 })).toThrow(ConfigValidationError);
      expect(() => configLoader.resolveConfig({ debounce: Number.NaN })).toThrow(
        "Invalid configuration for 'debounce': must be a non-negative number of seconds",
      );
    });
  });
});
