import type { GitCommandError } from "../errors";

export type SyncResult =
  | { status: "no-changes"; timestamp: string }
  | { status: "synced"; timestamp: string; message: string; pushed: boolean }
  | { status: "failed"; timestamp: string; command: string; error: GitCommandError; committed: boolean };
