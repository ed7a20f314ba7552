export const GIT_FORMATS = {
  // hash, author email, author date (strict ISO 8601)
  SOURCE_LOG: "--format=%H,%ae,%aI",
  // own hash, author date (strict ISO 8601), subject
  SYNC_LOG: "--format=%H,%aI,%s",
  SUMMARY: "--format=%h %ad %s",
} as const;

export const MIRROR_MESSAGE_PREFIX = "Synced from";

export const LOG_PATTERNS = {
  SOURCE_LINE: /^(?<sha>[a-f0-9]+),(?<email>[^,]+),(?<timestamp>[^ ]+)$/,
  SYNC_LINE: /^(?<target>[a-f0-9]+),(?<timestamp>[^,]+),Synced from (?<projectId>\w+):(?<sha>[a-f0-9]+)$/,
  SHA: /^[a-f0-9]+$/,
  PROJECT_ID: /^\w+$/,
  ISO_TIMESTAMP: /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/,
} as const;

export const ORPHAN_POLICIES = ["abort", "confirm-and-remove"] as const;

export const DEFAULT_CONFIG = {
  ORPHAN_POLICY: "abort",
  LOCK_FILE_NAME: "commit-mirror.lock",
  CONFIRM_ANSWER: "y",
} as const;

export const CONFIG_KEYS = {
  INCLUDE_EMAILS: "include-emails",
  PROJECTS: "projects",
  PROJECT_ID: "id",
  GIT_ROOT: "git-root",
  SYNC_REPO: "sync-repo",
  ORPHAN_POLICY: "orphan-policy",
} as const;

export const YAML_EXTENSIONS = [".yml", ".yaml", ".json"] as const;

export const ERROR_MESSAGES = {
  NO_COMMITS_YET: ["does not have any commits yet", "bad default revision 'HEAD'"],
} as const;

// simple-git refuses a custom environment that carries any of these
export const UNSAFE_GIT_ENV = {
  KEYS: [
    "EDITOR",
    "PAGER",
    "PREFIX",
    "SSH_ASKPASS",
    "GIT_ASKPASS",
    "GIT_EDITOR",
    "GIT_EXEC_PATH",
    "GIT_EXTERNAL_DIFF",
    "GIT_PAGER",
    "GIT_PROXY_COMMAND",
    "GIT_SEQUENCE_EDITOR",
    "GIT_SSH",
    "GIT_SSH_COMMAND",
    "GIT_TEMPLATE_DIR",
  ],
  PREFIXES: ["GIT_CONFIG"],
} as const;
