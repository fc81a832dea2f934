export const GIT_CONSTANTS = {
  REMOTE_NAME: "origin",
  DEFAULT_BRANCH: "main",
  GIT_DIR: ".git",
  DETACHED_HEAD: "HEAD",
} as const;

export const DEFAULT_CONFIG = {
  PATH: ".",
  DEBOUNCE_SECONDS: 2,
  PUSH: true,
  COMMIT_TEMPLATE: "autosync: {ts}",
  TIMESTAMP_PLACEHOLDER: "{ts}",
  DEBUG: false,
} as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  NOT_A_REPOSITORY: 2,
} as const;

export const ERROR_MESSAGES = {
  NOT_A_REPOSITORY: "directory is not a git repository",
  CONFIG_NOT_FOUND: "Config file not found",
  CONFIG_LOAD_FAILED: "Failed to load config file",
} as const;

export const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;
