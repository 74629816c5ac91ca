import { load, YAMLException } from "js-yaml";

import type { TaggedFlattenedMetrics } from "lib/metrics/types.js";

import type { RuntimeConfig } from "./config/env.js";
import { MetricRulesError } from "./errors.js";
import { decodeFlattened, isTaggedNumber, toTagged } from "./metrics/codec.js";
import { CompositeMetric } from "./metrics/composite.js";
import type { RulesEngine } from "./rules/engine.js";
import { StatusLevel, type ValidationStatus } from "./rules/status.js";
import { readTextFile } from "./utils/fs.js";
import { hasExtension } from "./utils/path.js";

export interface ValidationOutcome {
  metric: CompositeMetric;
  statuses: ValidationStatus[];
  alerts: ValidationStatus[];
  failures: ValidationStatus[];
  passed: boolean;
}

export interface ValidateArgs {
  rules: string[];
  metrics: string;
  storeDir: string | null;
  project: string | null;
}

export const VALIDATE_USAGE =
  "Usage: validate --rules <file-or-glob> [--rules ...] --metrics <file> [--store <dir>] [--project <name>]";

export function validateMetrics(metric: CompositeMetric, engine: RulesEngine): ValidationOutcome {
  const statuses = Array.from(engine.process(metric));
  const alerts = statuses.filter((status) => status.level === StatusLevel.ALERT);
  const failures = statuses.filter((status) => status.level === StatusLevel.FAILURE);
  return { metric, statuses, alerts, failures, passed: failures.length === 0 };
}

export function formatReport(outcome: ValidationOutcome): string {
  const verdict = outcome.passed ? "PASSED" : "FAILED";
  const summary =
    `Metric '${outcome.metric.name}': ${outcome.alerts.length} alert(s), ` +
    `${outcome.failures.length} validation failure(s). ${verdict}`;
  return [...outcome.statuses.map((status) => status.text), summary].join("\n");
}

/**
 * Turn a parsed metrics document into a composite. Values may be plain numbers
 * or `{kind, value}` tagged numbers; plain numbers get their kind inferred.
 */
export function metricFromDocument(document: unknown, source: string): CompositeMetric {
  if (typeof document !== "object" || document === null || Array.isArray(document)) {
    throw new MetricRulesError(`Metrics file ${source} must hold a mapping of metric paths to values`, "TYPE_MISMATCH");
  }
  const values: TaggedFlattenedMetrics = {};
  for (const [path, value] of Object.entries(document)) {
    if (typeof value === "number") {
      values[path] = toTagged(value);
    } else if (isTaggedNumber(value)) {
      values[path] = value;
    } else {
      throw new MetricRulesError(`Value for '${path}' in ${source} is not a number`, "TYPE_MISMATCH");
    }
  }
  const metric = decodeFlattened(values);
  if (!(metric instanceof CompositeMetric)) {
    throw new MetricRulesError(`Metrics file ${source} holds a single metric; rules apply to composites`, "TYPE_MISMATCH");
  }
  return metric;
}

export async function readMetricsFile(path: string): Promise<CompositeMetric> {
  const raw = await readTextFile(path);
  if (raw === null) {
    throw new MetricRulesError(`Metrics file ${path} does not exist`, "NOT_FOUND");
  }
  let document: unknown;
  try {
    document = hasExtension(path, [".json"]) ? JSON.parse(raw) : load(raw, { filename: path });
  } catch (error) {
    if (error instanceof SyntaxError || error instanceof YAMLException) {
      throw new MetricRulesError(`Unable to parse metrics file ${path}: ${error.message}`, "TYPE_MISMATCH", error);
    }
    throw error;
  }
  return metricFromDocument(document, path);
}

function optionValue(argv: string[], index: number, flag: string): string {
  const value = index < argv.length ? argv[index] : "";
  if (!value || value.startsWith("--")) {
    throw new Error(`Missing value for ${flag}. ${VALIDATE_USAGE}`);
  }
  return value;
}

export function parseValidateArgs(argv: string[], config: RuntimeConfig): ValidateArgs {
  const rules: string[] = [];
  let metrics: string | undefined;
  let storeDir = config.storeDir;
  let project = config.project;
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--rules") {
      rules.push(optionValue(argv, ++i, token));
    } else if (token === "--metrics") {
      metrics = optionValue(argv, ++i, token);
    } else if (token === "--store") {
      storeDir = optionValue(argv, ++i, token);
    } else if (token === "--project") {
      project = optionValue(argv, ++i, token);
    } else {
      throw new Error(`Unknown argument '${token}'. ${VALIDATE_USAGE}`);
    }
  }
  const rulePatterns = rules.length > 0 ? rules : config.rulesPaths;
  if (rulePatterns.length === 0 || !metrics) {
    throw new Error(VALIDATE_USAGE);
  }
  return { rules: rulePatterns, metrics, storeDir, project };
}
