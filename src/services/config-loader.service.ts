import * as fs from "fs/promises";
import * as path from "path";

import { DEFAULT_CONFIG, ERROR_MESSAGES, GIT_CONSTANTS } from "../constants";
import { ConfigError, ConfigValidationError, getErrorMessage, toError } from "../errors";
import { secondsToMs } from "../utils/timing";

import type { AutoSyncConfig, ConfigFile } from "../types";
import type { CliOptions } from "../utils/cli";

const STRING_FIELDS = ["path", "remote", "branch", "message"] as const;
const BOOLEAN_FIELDS = ["push", "debug"] as const;

export class ConfigLoaderService {
  async loadConfigFile(configPath: string): Promise<ConfigFile> {
    const absolutePath = path.resolve(configPath);

    let content: string;
    try {
      content = await fs.readFile(absolutePath, "utf-8");
    } catch (error) {
      throw new ConfigError(`${ERROR_MESSAGES.CONFIG_NOT_FOUND}: ${absolutePath}`, "NOT_FOUND", toError(error));
    }

    let config: unknown;
    try {
      config = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(
        `${ERROR_MESSAGES.CONFIG_LOAD_FAILED}: ${getErrorMessage(error)}`,
        "LOAD_FAILED",
        toError(error),
      );
    }

    this.validateConfigFile(config);
    return config;
  }

  private validateConfigFile(config: unknown): asserts config is ConfigFile {
    if (!config || typeof config !== "object" || Array.isArray(config)) {
      throw new ConfigValidationError("<root>", "config file must contain a JSON object");
    }

    const configObj = config as Record<string, unknown>;

    for (const field of STRING_FIELDS) {
      const value = configObj[field];
      if (value !== undefined && (typeof value !== "string" || value.length === 0)) {
        throw new ConfigValidationError(field, "must be a non-empty string");
      }
    }

    for (const field of BOOLEAN_FIELDS) {
      const value = configObj[field];
      if (value !== undefined && typeof value !== "boolean") {
        throw new ConfigValidationError(field, "must be a boolean");
      }
    }

    if (configObj.debounce !== undefined) {
      this.validateDebounce(configObj.debounce);
    }

    if (configObj.ignore !== undefined) {
      if (!Array.isArray(configObj.ignore) || !configObj.ignore.every((entry) => typeof entry === "string")) {
        throw new ConfigValidationError("ignore", "must be an array of strings");
      }
    }
  }

  /**
   * Merges CLI flags over config-file values over defaults. A relative `path`
   * from the config file resolves against the config file's directory.
   */
  resolveConfig(cli: CliOptions, file: ConfigFile = {}, configDir?: string): AutoSyncConfig {
    const debounce = cli.debounce ?? file.debounce ?? DEFAULT_CONFIG.DEBOUNCE_SECONDS;
    this.validateDebounce(debounce);

    const repoPath =
      cli.path !== undefined
        ? path.resolve(cli.path)
        : file.path !== undefined
          ? this.resolvePath(file.path, configDir)
          : path.resolve(DEFAULT_CONFIG.PATH);

    const resolved: AutoSyncConfig = {
      repoPath,
      remote: cli.remote ?? file.remote ?? GIT_CONSTANTS.REMOTE_NAME,
      debounceMs: secondsToMs(debounce),
      push: cli.push ?? file.push ?? DEFAULT_CONFIG.PUSH,
      ignore: [...(file.ignore ?? []), ...(cli.ignore ?? [])].filter((entry) => entry.length > 0),
      commitTemplate: cli.message ?? file.message ?? DEFAULT_CONFIG.COMMIT_TEMPLATE,
      debug: cli.debug ?? file.debug ?? DEFAULT_CONFIG.DEBUG,
    };

    const branch = cli.branch ?? file.branch;
    if (branch) {
      resolved.branch = branch;
    }

    return resolved;
  }

  private validateDebounce(value: unknown): asserts value is number {
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw new ConfigValidationError("debounce", "must be a non-negative number of seconds");
    }
  }

  private resolvePath(inputPath: string, baseDir?: string): string {
    if (path.isAbsolute(inputPath)) {
      return inputPath;
    }

    return path.resolve(baseDir || process.cwd(), inputPath);
  }
}
