import * as fs from "fs/promises";
import * as path from "path";

import simpleGit from "simple-git";

import { GIT_CONSTANTS } from "../constants";
import { GitCommandError, NotARepositoryError, getErrorMessage, toError } from "../errors";

import { Logger } from "./logger.service";

import type { SimpleGit } from "simple-git";

/**
 * Throws NotARepositoryError unless `repoPath` has a `.git` entry. A `.git`
 * file (linked worktrees, submodules) counts as well as a directory.
 */
export async function assertWorkingCopy(repoPath: string): Promise<void> {
  try {
    await fs.access(path.join(repoPath, GIT_CONSTANTS.GIT_DIR));
  } catch {
    throw new NotARepositoryError(repoPath);
  }
}

export class GitService {
  private git: SimpleGit;
  private logger: Logger;

  constructor(
    public readonly repoPath: string,
    logger?: Logger,
  ) {
    this.git = simpleGit(repoPath);
    this.logger = logger ?? Logger.createDefault();
  }

  /**
   * Stages every change in the working tree, honoring .gitignore.
   */
  async stageAll(): Promise<void> {
    await this.run(["add", "-A"], (git) => git.add("-A"));
  }

  async hasPendingChanges(): Promise<boolean> {
    const status = await this.run(["status", "--porcelain"], (git) => git.status(), { quiet: true });
    return !status.isClean();
  }

  async commit(message: string): Promise<string> {
    const result = await this.run(["commit", "-m", message], (git) => git.commit(message));
    return result.commit;
  }

  async push(remote: string, branch: string): Promise<void> {
    await this.run(["push", remote, branch], (git) => git.push(remote, branch));
  }

  /**
   * Name of the checked-out branch, or the default branch name when it cannot
   * be determined (detached HEAD, unborn branch, git failure).
   */
  async getCurrentBranch(): Promise<string> {
    try {
      const branch = (await this.git.revparse(["--abbrev-ref", "HEAD"])).trim();
      if (branch && branch !== GIT_CONSTANTS.DETACHED_HEAD) {
        return branch;
      }
      this.logger.warn(`Could not resolve current branch, falling back to '${GIT_CONSTANTS.DEFAULT_BRANCH}'`);
    } catch (error) {
      this.logger.warn(
        `Could not resolve current branch (${getErrorMessage(error)}), falling back to '${GIT_CONSTANTS.DEFAULT_BRANCH}'`,
      );
    }
    return GIT_CONSTANTS.DEFAULT_BRANCH;
  }

  private async run<T>(
    args: string[],
    operation: (git: SimpleGit) => Promise<T>,
    options: { quiet?: boolean } = {},
  ): Promise<T> {
    const command = `git ${args.join(" ")}`;
    if (options.quiet) {
      this.logger.debug(`Running: ${command}`);
    } else {
      this.logger.info(`Running: ${command}`);
    }

    try {
      return await operation(this.git);
    } catch (error) {
      throw new GitCommandError(command, getErrorMessage(error).trim(), toError(error));
    }
  }
}
