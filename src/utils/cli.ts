import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { DEFAULT_CONFIG, GIT_CONSTANTS } from "../constants";

import type { AutoSyncConfig } from "../types";

/**
 * Flags as given on the command line. Unset flags stay undefined so that
 * config-file values can fill them in.
 */
export interface CliOptions {
  config?: string;
  path?: string;
  remote?: string;
  branch?: string;
  debounce?: number;
  push?: boolean;
  ignore?: string[];
  message?: string;
  debug?: boolean;
}

export function parseArguments(argv: string[] = hideBin(process.argv)): CliOptions {
  const args = yargs(argv)
    .scriptName("git-autosync")
    .usage("$0 [options]\n\nStage, commit and push changes in a git repository whenever files change.")
    .option("config", {
      alias: "c",
      type: "string",
      description: "Path to a JSON config file",
    })
    .option("path", {
      alias: "p",
      type: "string",
      description: `Path to the repository root to watch (default: ${DEFAULT_CONFIG.PATH})`,
    })
    .option("remote", {
      alias: "r",
      type: "string",
      description: `Remote name to push to (default: ${GIT_CONSTANTS.REMOTE_NAME})`,
    })
    .option("branch", {
      alias: "b",
      type: "string",
      description: "Branch name to push to (default: current branch)",
    })
    .option("debounce", {
      alias: "d",
      type: "number",
      description: `Seconds to wait for quiet before committing (default: ${DEFAULT_CONFIG.DEBOUNCE_SECONDS})`,
    })
    .option("push", {
      type: "boolean",
      description: "Push after committing; --no-push only commits locally",
    })
    .option("ignore", {
      alias: "i",
      type: "string",
      array: true,
      description: "Path substring to ignore (repeatable)",
    })
    .option("message", {
      alias: "m",
      type: "string",
      description: `Commit message template, {ts} is replaced with the UTC time (default: "${DEFAULT_CONFIG.COMMIT_TEMPLATE}")`,
    })
    .option("debug", {
      type: "boolean",
      description: "Enable debug logging",
    })
    .strict()
    .help()
    .alias("help", "h")
    .parseSync();

  return {
    config: args.config,
    path: args.path,
    remote: args.remote,
    branch: args.branch,
    debounce: args.debounce,
    push: args.push,
    ignore: args.ignore?.map(String),
    message: args.message,
    debug: args.debug,
  };
}

export function reconstructCliCommand(config: AutoSyncConfig, branch: string): string {
  const args: string[] = [];

  args.push(`--path "${config.repoPath}"`);

  if (config.remote !== GIT_CONSTANTS.REMOTE_NAME) {
    args.push(`--remote "${config.remote}"`);
  }

  args.push(`--branch "${branch}"`);

  if (config.debounceMs !== DEFAULT_CONFIG.DEBOUNCE_SECONDS * 1000) {
    args.push(`--debounce ${config.debounceMs / 1000}`);
  }

  if (!config.push) {
    args.push("--no-push");
  }

  for (const pattern of config.ignore) {
    args.push(`--ignore "${pattern}"`);
  }

  if (config.commitTemplate !== DEFAULT_CONFIG.COMMIT_TEMPLATE) {
    args.push(`--message "${config.commitTemplate}"`);
  }

  return `git-autosync ${args.join(" ")}`;
}
