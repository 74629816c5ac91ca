import type { RuleAction } from "lib/metrics/types.js";

import { STATUS_BANNER } from "../constants.js";
import { validateRulesDocument } from "../contracts/validators.js";
import { RuleConfigurationError } from "../errors.js";
import type { CompositeMetric } from "../metrics/composite.js";
import { logger } from "../utils/logger.js";
import { Rule, ThresholdViolation } from "./rule.js";
import { StatusLevel, ValidationStatus } from "./status.js";

const STATUS_LABELS: Record<Exclude<StatusLevel, "improvement">, string> = {
  alert: "ALERT",
  failure: "VALIDATION FAILURE"
};

function isRuleAction(action: string): action is RuleAction {
  return action === "confirm" || action === "validate";
}

/**
 * A set of rules applied together to one composite metric. Alert rules report
 * concerns; validation rules report failures that should reject the metric.
 * Both keep insertion order so statuses come out in a stable order.
 */
export class RulesEngine {
  private readonly alertRules: Rule[] = [];
  private readonly validationRules: Rule[] = [];
  private readonly exclusionPatterns = new Set<string>();

  get alerts(): readonly Rule[] {
    return this.alertRules;
  }

  get validations(): readonly Rule[] {
    return this.validationRules;
  }

  get exclusions(): ReadonlySet<string> {
    return this.exclusionPatterns;
  }

  addAlert(rule: Rule): void {
    if (!this.alertRules.includes(rule)) {
      this.alertRules.push(rule);
    }
  }

  addValidation(rule: Rule): void {
    if (!this.validationRules.includes(rule)) {
      this.validationRules.push(rule);
    }
  }

  addExclusion(pattern: string): void {
    if (!pattern) {
      throw new RuleConfigurationError("Exclusion pattern cannot be empty");
    }
    this.exclusionPatterns.add(pattern);
  }

  /** Fold another engine's rules and exclusions into this one. */
  merge(other: RulesEngine): this {
    other.alertRules.forEach((rule) => this.addAlert(rule));
    other.validationRules.forEach((rule) => this.addValidation(rule));
    other.exclusionPatterns.forEach((pattern) => this.addExclusion(pattern));
    return this;
  }

  *process(metric: CompositeMetric): Generator<ValidationStatus, void, undefined> {
    yield* this.run(this.alertRules, StatusLevel.ALERT, metric);
    yield* this.run(this.validationRules, StatusLevel.FAILURE, metric);
  }

  private *run(
    rules: readonly Rule[],
    level: Exclude<StatusLevel, "improvement">,
    metric: CompositeMetric
  ): Generator<ValidationStatus, void, undefined> {
    for (const rule of rules) {
      try {
        rule.validate(metric, this.exclusionPatterns);
      } catch (error) {
        if (!(error instanceof ThresholdViolation)) {
          throw error;
        }
        logger.debug("Rule violated", {
          rule: rule.description,
          level,
          offending: error.offendingElements.length
        });
        const text = `\n${STATUS_BANNER}\n${STATUS_LABELS[level]}: For rule '${rule.description}':\n${error.message}`;
        yield new ValidationStatus(level, text, error.parentMetric, error.offendingElements);
      }
    }
  }

  /**
   * Build an engine from a parsed rules document:
   *
   * ```yaml
   * content:
   *   - ruleset:
   *       description: CPU limits
   *       exclusions:
   *         - exclusion: /Root/scratch*
   *       rules:
   *         - action: validate
   *           rule: "/Root#cpu < 70"
   * ```
   *
   * @param source file name used in error messages
   */
  static fromDocument(document: unknown, source?: string): RulesEngine {
    if (typeof document !== "object" || document === null || !("content" in document)) {
      throw new RuleConfigurationError("Rules document must define a 'content' list of rulesets", source);
    }
    if (!Array.isArray(document.content) || document.content.length === 0) {
      throw new RuleConfigurationError("Rules document 'content' must be a non-empty list of rulesets", source);
    }
    const result = validateRulesDocument(document);
    if (!result.valid) {
      throw new RuleConfigurationError(`Invalid rules document: ${result.errors.join("; ")}`, source);
    }

    const engine = new RulesEngine();
    result.value.content.forEach(({ ruleset }, index) => {
      const label = ruleset.description ?? `ruleset ${index + 1}`;
      if (ruleset.rules.length === 0) {
        throw new RuleConfigurationError(`No rules specified for '${label}'`, source);
      }
      for (const { exclusion } of ruleset.exclusions ?? []) {
        engine.addExclusion(exclusion);
      }
      for (const { action, rule } of ruleset.rules) {
        if (!isRuleAction(action)) {
          throw new RuleConfigurationError(`Invalid action specified: '${action}'`, source);
        }
        let parsed: Rule;
        try {
          parsed = Rule.parse(rule);
        } catch (error) {
          if (error instanceof RuleConfigurationError) {
            throw new RuleConfigurationError(error.message, source, error);
          }
          throw error;
        }
        if (action === "confirm") {
          engine.addAlert(parsed);
        } else {
          engine.addValidation(parsed);
        }
      }
    });
    return engine;
  }
}
