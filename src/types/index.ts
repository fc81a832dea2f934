export type WatchEventKind = "add" | "addDir" | "change" | "unlink" | "unlinkDir";

export interface WatchEvent {
  path: string;
  kind: WatchEventKind;
}

/**
 * Fully resolved runtime configuration. Built once at startup from CLI flags,
 * an optional config file and the defaults.
 */
export interface AutoSyncConfig {
  /** Absolute path of the repository root to watch */
  repoPath: string;
  remote: string;
  /** Branch to push. Resolved from the checkout when omitted. */
  branch?: string;
  debounceMs: number;
  push: boolean;
  ignore: string[];
  /** Commit message template; `{ts}` is replaced with the UTC timestamp */
  commitTemplate: string;
  debug: boolean;
}

/**
 * Shape of the optional JSON config file. Every field is optional and
 * overridden by flags given on the command line.
 */
export interface ConfigFile {
  path?: string;
  remote?: string;
  branch?: string;
  debounce?: number;
  push?: boolean;
  ignore?: string[];
  message?: string;
  debug?: boolean;
}

export type SyncSession = Readonly<{
  repoPath: string;
  remote: string;
  branch: string;
  commitTemplate: string;
  push: boolean;
}>;
