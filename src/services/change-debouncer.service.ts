import pLimit from "p-limit";

import { DEFAULT_CONFIG } from "../constants";
import { isInsideMetadataDir, matchesIgnoreSubstring, resolveEventPath } from "../utils/paths";
import { secondsToMs } from "../utils/timing";

import { Logger } from "./logger.service";

import type { WatchEvent } from "../types";

export type DebouncedCallback = () => void | Promise<void>;

export interface ChangeDebouncerOptions {
  repoPath: string;
  debounceMs?: number;
  /** Substrings; an event whose absolute path contains any of them is dropped */
  ignore?: readonly string[];
  logger?: Logger;
}

/**
 * Coalesces bursts of filesystem events into a single callback invocation
 * once no qualifying event has arrived for `debounceMs`.
 *
 * Arming and cancelling run synchronously on the event loop, so an event can
 * never interleave with a firing timer. Callback runs are serialized: a
 * trigger that fires while the previous run is still going waits for it.
 */
export class ChangeDebouncer {
  private pendingTrigger: NodeJS.Timeout | null = null;
  private readonly limit = pLimit(1);
  private readonly inFlight = new Set<Promise<void>>();
  private readonly repoPath: string;
  private readonly debounceMs: number;
  private readonly ignore: readonly string[];
  private readonly logger: Logger;

  constructor(
    private readonly callback: DebouncedCallback,
    options: ChangeDebouncerOptions,
  ) {
    this.repoPath = options.repoPath;
    this.debounceMs = options.debounceMs ?? secondsToMs(DEFAULT_CONFIG.DEBOUNCE_SECONDS);
    this.ignore = options.ignore ?? [];
    this.logger = options.logger ?? Logger.createDefault();
  }

  /**
   * Returns true when the event (re)armed the trigger.
   */
  handleEvent(event: WatchEvent): boolean {
    const absolutePath = resolveEventPath(this.repoPath, event.path);

    if (this.shouldIgnore(absolutePath)) {
      this.logger.debug(`Ignoring ${event.kind} ${absolutePath}`);
      return false;
    }

    this.logger.debug(`Change detected: ${event.kind} ${absolutePath}`);
    this.arm();
    return true;
  }

  shouldIgnore(absolutePath: string): boolean {
    return isInsideMetadataDir(this.repoPath, absolutePath) || matchesIgnoreSubstring(absolutePath, this.ignore);
  }

  isPending(): boolean {
    return this.pendingTrigger !== null;
  }

  isRunning(): boolean {
    return this.inFlight.size > 0;
  }

  cancel(): void {
    if (this.pendingTrigger) {
      clearTimeout(this.pendingTrigger);
      this.pendingTrigger = null;
    }
  }

  /**
   * Resolves once every callback run started so far has settled.
   */
  async whenIdle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  /**
   * Fires an armed trigger immediately instead of dropping it, then waits for
   * every run to settle.
   */
  async stop(): Promise<void> {
    if (this.pendingTrigger) {
      clearTimeout(this.pendingTrigger);
      this.fire();
    }
    await this.whenIdle();
  }

  private arm(): void {
    this.cancel();
    this.pendingTrigger = setTimeout(() => this.fire(), this.debounceMs);
  }

  private fire(): void {
    this.pendingTrigger = null;
    const run = this.limit(() => this.invoke());
    this.inFlight.add(run);
    void run.then(() => {
      this.inFlight.delete(run);
    });
  }

  private async invoke(): Promise<void> {
    try {
      await this.callback();
    } catch (error) {
      this.logger.error("Auto-sync callback error:", error);
    }
  }
}
