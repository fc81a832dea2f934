import { watch } from "chokidar";

import { isInsideMetadataDir } from "../utils/paths";

import { Logger } from "./logger.service";

import type { ChangeDebouncer } from "./change-debouncer.service";
import type { FSWatcher } from "chokidar";

/**
 * Recursively watches the repository root and forwards every change to the
 * debouncer. Events from before `start()` resolves are not reported.
 */
export class RepositoryWatcher {
  private watcher: FSWatcher | null = null;
  private closing: Promise<void> | null = null;
  private logger: Logger;

  constructor(
    private readonly repoPath: string,
    private readonly debouncer: ChangeDebouncer,
    logger?: Logger,
  ) {
    this.logger = logger ?? Logger.createDefault();
  }

  isWatching(): boolean {
    return this.watcher !== null && this.closing === null;
  }

  /**
   * Resolves once the initial scan is done. Aborting `signal` closes the
   * watcher.
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.watcher) return;
    if (signal?.aborted) return;

    const watcher = watch(this.repoPath, {
      persistent: true,
      ignoreInitial: true,
      // .git churns on every commit; skip traversing it entirely
      ignored: (watchedPath: string) => isInsideMetadataDir(this.repoPath, watchedPath),
    });
    this.watcher = watcher;

    watcher.on("all", (eventName, filePath) => {
      this.debouncer.handleEvent({ path: filePath, kind: eventName });
    });
    watcher.on("error", (error) => {
      this.logger.error("File watcher error:", error);
    });

    await new Promise<void>((resolve) => {
      watcher.once("ready", () => resolve());
      // Stays registered after ready: it is also what closes the watcher on a later abort
      signal?.addEventListener(
        "abort",
        () => {
          void this.stop().then(resolve);
        },
        { once: true },
      );
    });
    this.logger.debug(`Watcher ready for ${this.repoPath}`);
  }

  stop(): Promise<void> {
    if (!this.watcher) {
      return Promise.resolve();
    }
    if (!this.closing) {
      this.closing = this.watcher.close().catch((error: unknown) => {
        this.logger.error("Failed to close file watcher:", error);
      });
    }
    return this.closing;
  }
}
