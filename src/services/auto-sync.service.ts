import { GitCommandError } from "../errors";
import { formatCommitMessage, formatTimestamp } from "../utils/commit-message";
import { Timer, formatDuration } from "../utils/timing";

import { Logger } from "./logger.service";

import type { GitService } from "./git.service";
import type { SyncSession } from "../types";
import type { SyncResult } from "../types/sync-result";

/**
 * Runs one stage → commit → push pass against the session's repository.
 */
export class AutoSyncService {
  private logger: Logger;
  private lastResult: SyncResult | null = null;

  constructor(
    public readonly session: SyncSession,
    private readonly gitService: GitService,
    logger?: Logger,
  ) {
    this.logger = logger ?? Logger.createDefault();
  }

  getLastResult(): SyncResult | null {
    return this.lastResult;
  }

  async sync(): Promise<SyncResult> {
    const result = await this.runSync();
    this.lastResult = result;
    return result;
  }

  private async runSync(): Promise<SyncResult> {
    const timer = new Timer();
    const timestamp = formatTimestamp(new Date());
    const message = formatCommitMessage(this.session.commitTemplate, timestamp);
    let committed = false;

    try {
      await this.gitService.stageAll();

      if (!(await this.gitService.hasPendingChanges())) {
        this.logger.info("No changes to commit.");
        return { status: "no-changes", timestamp };
      }

      await this.gitService.commit(message);
      committed = true;

      if (this.session.push) {
        await this.gitService.push(this.session.remote, this.session.branch);
      }

      this.logger.info(`Synced at ${timestamp} (${formatDuration(timer.stop())})`);
      return { status: "synced", timestamp, message, pushed: this.session.push };
    } catch (error) {
      if (!(error instanceof GitCommandError)) {
        throw error;
      }

      this.logger.error("Git command failed:", error);
      if (committed) {
        this.logger.warn(
          `Local commit was created but not pushed to ${this.session.remote}/${this.session.branch}; it will be pushed with the next synced change.`,
        );
      }
      return { status: "failed", timestamp, command: error.command, error, committed };
    }
  }
}
