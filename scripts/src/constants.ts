export const PATH_SEPARATOR = "/";
export const LEAF_MARKER = "#";
export const MATCH_ALL_PATTERN = "*";

export const STATUS_BANNER = "--------------------------------";

export const STORE_FILE_NAME = "metrics.store.json";
export const STORE_DOCUMENT_VERSION = 1;

export const RULE_FILE_EXTENSIONS = [".yaml", ".yml"];

export const RUNTIME_ENV_VARIABLES = {
  logLevel: "LOG_LEVEL",
  rulesPaths: "METRIC_RULES_PATHS",
  storeDir: "METRIC_STORE_DIR",
  project: "METRIC_PROJECT"
} as const;
