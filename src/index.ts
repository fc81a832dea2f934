#!/usr/bin/env node

import * as path from "path";

import { hideBin } from "yargs/helpers";

import { EXIT_CODES } from "./constants";
import { ConfigError, getErrorMessage } from "./errors";
import { AutoSyncService } from "./services/auto-sync.service";
import { ChangeDebouncer } from "./services/change-debouncer.service";
import { ConfigLoaderService } from "./services/config-loader.service";
import { GitService, assertWorkingCopy } from "./services/git.service";
import { Logger } from "./services/logger.service";
import { RepositoryWatcher } from "./services/repository-watcher.service";
import { parseArguments, reconstructCliCommand } from "./utils/cli";
import { abortOnShutdownSignals, waitForAbort } from "./utils/signals";

import type { AutoSyncConfig, ConfigFile, SyncSession } from "./types";

export async function loadConfig(argv: string[]): Promise<AutoSyncConfig> {
  const options = parseArguments(argv);
  const configLoader = new ConfigLoaderService();

  let configFile: ConfigFile | undefined;
  let configDir: string | undefined;
  if (options.config) {
    configFile = await configLoader.loadConfigFile(options.config);
    configDir = path.dirname(path.resolve(options.config));
  }

  return configLoader.resolveConfig(options, configFile, configDir);
}

/**
 * Watches until `controller` is aborted (SIGINT and SIGTERM abort it), then
 * stops the watcher and flushes the debouncer before returning.
 */
export async function run(
  config: AutoSyncConfig,
  logger: Logger,
  controller: AbortController = new AbortController(),
): Promise<void> {
  await assertWorkingCopy(config.repoPath);

  const gitService = new GitService(config.repoPath, logger);
  const branch = config.branch ?? (await gitService.getCurrentBranch());

  const session: SyncSession = {
    repoPath: config.repoPath,
    remote: config.remote,
    branch,
    commitTemplate: config.commitTemplate,
    push: config.push,
  };
  const syncService = new AutoSyncService(session, gitService, logger);

  const debouncer = new ChangeDebouncer(
    async () => {
      logger.info("Detected changes, committing...");
      await syncService.sync();
    },
    { repoPath: config.repoPath, debounceMs: config.debounceMs, ignore: config.ignore, logger },
  );
  const watcher = new RepositoryWatcher(config.repoPath, debouncer, logger);

  const disposeSignals = abortOnShutdownSignals(controller);

  try {
    logger.debug(`Equivalent command: ${reconstructCliCommand(config, branch)}`);
    await watcher.start(controller.signal);
    logger.info(`Watching ${config.repoPath} branch=${branch} remote=${config.remote}`);
    if (!config.push) {
      logger.info("Push disabled, changes are committed locally only.");
    }

    await waitForAbort(controller.signal);

    logger.info("Stopping watcher...");
    await watcher.stop();
    await debouncer.stop();

    const lastResult = syncService.getLastResult();
    if (lastResult?.status === "failed" && lastResult.committed) {
      logger.warn(`Exiting with unpushed commits on ${branch}.`);
    }
  } finally {
    disposeSignals();
  }
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<number> {
  const logger = new Logger();

  let config: AutoSyncConfig;
  try {
    config = await loadConfig(argv);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Error: ${error.message}`);
      return error.exitCode;
    }
    throw error;
  }

  const runLogger = new Logger({ debug: config.debug });
  try {
    await run(config, runLogger);
  } catch (error) {
    if (error instanceof ConfigError) {
      runLogger.error(`Error: ${error.message}`);
      return error.exitCode;
    }
    throw error;
  }

  return EXIT_CODES.SUCCESS;
}

if (require.main === module) {
  main()
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error: unknown) => {
      console.error("❌ Unhandled error:", getErrorMessage(error));
      process.exit(EXIT_CODES.FAILURE);
    });
}
