import { describe, expect, it } from "vitest";

import { RuleConfigurationError } from "../src/errors.js";
import { CompositeMetric, Metric } from "../src/metrics/composite.js";
import { Evaluation, Rule, ThresholdViolation, parseRule, rootedPath } from "../src/rules/rule.js";

function rootWithCpu(cpu: number): CompositeMetric {
  return new CompositeMetric("Root", [new Metric("cpu", cpu)]);
}

function captureViolation(action: () => void): ThresholdViolation {
  try {
    action();
  } catch (error) {
    if (error instanceof ThresholdViolation) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a threshold violation");
}

describe("Rule.validate", () => {
  const cpuRule = new Rule("/Root#cpu", Evaluation.LESS_THAN, 70);

  it("reports a value that breaks the limit", () => {
    const metric = rootWithCpu(71);
    const violation = captureViolation(() => cpuRule.validate(metric));
    expect(violation.offendingElements).toEqual(["#cpu"]);
    expect(violation.parentMetric).toBe(metric);
    expect(violation.message).toBe("  /Root#cpu >= 70");
    expect(violation.code).toBe("THRESHOLD_VIOLATION");
  });

  it("passes silently when the value holds", () => {
    expect(() => cpuRule.validate(rootWithCpu(69))).not.toThrow();
  });

  it.each<[Evaluation, number, boolean]>([
    [Evaluation.LESS_THAN, 70, false],
    [Evaluation.LESS_THAN_OR_EQUAL, 70, true],
    [Evaluation.GREATER_THAN, 70, false],
    [Evaluation.GREATER_THAN_OR_EQUAL, 70, true],
    [Evaluation.GREATER_THAN, 69.5, true]
  ])("applies %s %d to a value of 70 (holds: %s)", (operation, limit, holds) => {
    const rule = new Rule("*", operation, limit);
    const run = () => rule.validate(rootWithCpu(70));
    if (holds) {
      expect(run).not.toThrow();
    } else {
      expect(run).toThrow(ThresholdViolation);
    }
  });

  it("writes one line per offending path with the negated operator", () => {
    const metric = new CompositeMetric("Root", [
      new Metric("cpu", 95),
      new CompositeMetric("workers", [new Metric("a", 10), new Metric("b", 120)])
    ]);
    const violation = captureViolation(() => new Rule("*", Evaluation.LESS_THAN_OR_EQUAL, 90.5).validate(metric));
    expect(violation.offendingElements).toEqual(["#cpu", "workers#b"]);
    expect(violation.message).toBe("  /Root#cpu > 90.5\n  /Root/workers#b > 90.5");
  });

  it("only checks leaves selected by the pattern", () => {
    const metric = new CompositeMetric("Root", [
      new Metric("cpu", 95),
      new CompositeMetric("workers", [new Metric("a", 10), new Metric("b", 120)])
    ]);
    const violation = captureViolation(() => new Rule("/Root/workers#*", Evaluation.LESS_THAN, 100).validate(metric));
    expect(violation.offendingElements).toEqual(["workers#b"]);
  });

  it("selects leaves named outside the basic plane with '?'", () => {
    const metric = new CompositeMetric("R", [new Metric("😀", 5)]);
    const violation = captureViolation(() => new Rule("/R#?", Evaluation.LESS_THAN, 1).validate(metric));
    expect(violation.offendingElements).toEqual(["#😀"]);
    expect(violation.message).toBe("  /R#😀 >= 1");
  });

  it("never evaluates excluded leaves", () => {
    const metric = new CompositeMetric("Root", [
      new Metric("cpu", 10),
      new CompositeMetric("sub", [new Metric("load", 500), new CompositeMetric("deep", [new Metric("x", 900)])])
    ]);
    const rule = new Rule("*", Evaluation.LESS_THAN, 100);
    expect(() => rule.validate(metric, ["/Root/sub*"])).not.toThrow();
    expect(captureViolation(() => rule.validate(metric)).offendingElements).toEqual(["sub#load", "sub/deep#x"]);
  });
});

describe("parseRule", () => {
  it("parses pattern, operator and limit", () => {
    const rule = parseRule("/Root/memory#* <= 1e3");
    expect(rule.pattern).toBe("/Root/memory#*");
    expect(rule.operation).toBe("<=");
    expect(rule.limit).toBe(1000);
    expect(rule.description).toBe("/Root/memory#* <= 1000");
  });

  it("keeps an explicit description", () => {
    expect(parseRule("* > -0.5", "no negatives").description).toBe("no negatives");
  });

  it.each(["/Root#cpu < ", "/Root#cpu << 70", "/Root#cpu < seventy", "/Root#cpu < 70 extra", "/Root#cpu < 0x10"])(
    "rejects %j",
    (text) => {
      expect(() => parseRule(text)).toThrow(RuleConfigurationError);
    }
  );
});

describe("rootedPath", () => {
  it("joins keys under the metric name", () => {
    const metric = new CompositeMetric("Root");
    expect(rootedPath(metric, "#cpu")).toBe("/Root#cpu");
    expect(rootedPath(metric, "sub/deep#x")).toBe("/Root/sub/deep#x");
  });
});
