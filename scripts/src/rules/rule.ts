import { LEAF_MARKER, MATCH_ALL_PATTERN, PATH_SEPARATOR } from "../constants.js";
import { MetricRulesError, RuleConfigurationError } from "../errors.js";
import type { CompositeMetric } from "../metrics/composite.js";
import { globMatcher } from "../utils/glob.js";

/** Comparison a metric value must satisfy against the rule's limit. */
export const Evaluation = {
  LESS_THAN: "<",
  GREATER_THAN: ">",
  LESS_THAN_OR_EQUAL: "<=",
  GREATER_THAN_OR_EQUAL: ">="
} as const;

export type Evaluation = (typeof Evaluation)[keyof typeof Evaluation];

const NEGATED: Record<Evaluation, string> = {
  "<": ">=",
  ">": "<=",
  "<=": ">",
  ">=": "<"
};

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isEvaluation(token: string): token is Evaluation {
  return Object.hasOwn(NEGATED, token);
}

function holds(value: number, operation: Evaluation, limit: number): boolean {
  switch (operation) {
    case "<":
      return value < limit;
    case ">":
      return value > limit;
    case "<=":
      return value <= limit;
    case ">=":
      return value >= limit;
  }
}

/**
 * Root a key from `CompositeMetric.keys()` under the metric's own name:
 * `#cpu` becomes `/Root#cpu` and `sub#cpu` becomes `/Root/sub#cpu`.
 */
export function rootedPath(metric: CompositeMetric, key: string): string {
  if (key.startsWith(LEAF_MARKER)) {
    return `${PATH_SEPARATOR}${metric.name}${key}`;
  }
  return `${PATH_SEPARATOR}${metric.name}${PATH_SEPARATOR}${key}`;
}

export class ThresholdViolation extends MetricRulesError {
  public readonly parentMetric: CompositeMetric;
  public readonly offendingElements: readonly string[];

  constructor(message: string, parentMetric: CompositeMetric, offendingElements: readonly string[]) {
    super(message, "THRESHOLD_VIOLATION");
    this.name = "ThresholdViolation";
    this.parentMetric = parentMetric;
    this.offendingElements = offendingElements;
  }
}

export class Rule {
  readonly pattern: string;
  readonly operation: Evaluation;
  readonly limit: number;
  readonly description: string;

  constructor(pattern: string, operation: Evaluation, limit: number, description?: string) {
    if (!pattern) {
      throw new RuleConfigurationError("Rule pattern cannot be empty");
    }
    if (!isEvaluation(operation)) {
      throw new RuleConfigurationError(`Unknown rule operation '${String(operation)}'`);
    }
    if (!Number.isFinite(limit)) {
      throw new RuleConfigurationError(`Rule limit must be a finite number; got ${String(limit)}`);
    }
    this.pattern = pattern;
    this.operation = operation;
    this.limit = limit;
    this.description = description || `${pattern} ${operation} ${limit}`;
  }

  static parse(text: string, description?: string): Rule {
    const tokens = text.trim().split(/\s+/);
    if (tokens.length !== 3) {
      throw new RuleConfigurationError(
        `Invalid rule '${text}'. Must be in format 'pattern [<, >, <=, >=] float-value'`
      );
    }
    const [pattern, operation, limit] = tokens;
    if (!isEvaluation(operation)) {
      throw new RuleConfigurationError(`Invalid operator '${operation}' in rule '${text}'`);
    }
    if (!NUMBER_PATTERN.test(limit)) {
      throw new RuleConfigurationError(`Invalid limit '${limit}' in rule '${text}'`);
    }
    return new Rule(pattern, operation, Number(limit), description);
  }

  /**
   * Check every leaf of `metric` selected by this rule's pattern.
   *
   * @param exclusions globs over rooted paths; matching leaves are skipped
   * @throws ThresholdViolation listing every leaf that breaks the limit
   */
  validate(metric: CompositeMetric, exclusions: Iterable<string> = []): void {
    const isExcluded = globMatcher(exclusions);
    const isSelected: (path: string) => boolean =
      this.pattern === MATCH_ALL_PATTERN ? () => true : globMatcher([this.pattern]);
    const failed: string[] = [];
    const lines: string[] = [];

    for (const key of metric.keys(true)) {
      const path = rootedPath(metric, key);
      if (isExcluded(path) || !isSelected(path)) {
        continue;
      }
      const value = metric.metric(key).value;
      if (!holds(value, this.operation, this.limit)) {
        failed.push(key);
        lines.push(`  ${path} ${NEGATED[this.operation]} ${this.limit}`);
      }
    }

    if (failed.length > 0) {
      throw new ThresholdViolation(lines.join("\n"), metric, failed);
    }
  }
}

export function parseRule(text: string, description?: string): Rule {
  return Rule.parse(text, description);
}
