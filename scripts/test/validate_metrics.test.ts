import { fileURLToPath } from "node:url";
import { resolve } from "node:path";

import { describe, expect, it } from "vitest";

import type { RuntimeConfig } from "../src/config/env.js";
import { CompositeMetric, Metric } from "../src/metrics/composite.js";
import { RulesEngine } from "../src/rules/engine.js";
import { loadRulesEngine } from "../src/rules/loader.js";
import { Evaluation, Rule } from "../src/rules/rule.js";
import {
  formatReport,
  metricFromDocument,
  parseValidateArgs,
  readMetricsFile,
  validateMetrics,
  VALIDATE_USAGE
} from "../src/validate_metrics.js";

const FIXTURES = fileURLToPath(new URL("./fixtures", import.meta.url));

const BASE_CONFIG: RuntimeConfig = { logLevel: "info", rulesPaths: [], storeDir: null, project: null };

describe("validateMetrics", () => {
  it("reports alerts from rule files without failing", async () => {
    const engine = await loadRulesEngine(["rules/resources.yaml", "rules/latency.yml"], { cwd: FIXTURES });
    const metric = await readMetricsFile(resolve(FIXTURES, "metrics/host.json"));

    const outcome = validateMetrics(metric, engine);
    expect(outcome.passed).toBe(true);
    expect(outcome.alerts).toHaveLength(2);
    expect(outcome.failures).toHaveLength(0);
    expect(formatReport(outcome)).toBe(
      [
        "\n--------------------------------\nALERT: For rule '/Host#cpu < 80':\n  /Host#cpu >= 80",
        "\n--------------------------------\nALERT: For rule '/Host/latency#* <= 250':\n  /Host/latency#p99 > 250",
        "Metric 'Host': 2 alert(s), 0 validation failure(s). PASSED"
      ].join("\n")
    );
  });

  it("fails when a validation rule is broken", () => {
    const engine = new RulesEngine();
    engine.addValidation(new Rule("/Host#cpu", Evaluation.LESS_THAN, 50));
    const outcome = validateMetrics(new CompositeMetric("Host", [new Metric("cpu", 75)]), engine);
    expect(outcome.passed).toBe(false);
    expect(formatReport(outcome).split("\n").at(-1)).toBe("Metric 'Host': 0 alert(s), 1 validation failure(s). FAILED");
  });

  it("accepts YAML metrics files", async () => {
    const engine = await loadRulesEngine(["rules/resources.yaml"], { cwd: FIXTURES });
    const metric = await readMetricsFile(resolve(FIXTURES, "metrics/host-ok.yaml"));
    expect(metric.metric("memory#free").value).toBe(4096);
    expect(validateMetrics(metric, engine).statuses).toEqual([]);
  });
});

describe("metricFromDocument", () => {
  it("accepts plain and tagged values", () => {
    const metric = metricFromDocument({ "/Host#cpu": 50, "/Host#load": { kind: "float", value: 2 } }, "inline");
    expect(metric.metric("cpu").kind).toBe("int");
    expect(metric.metric("load").kind).toBe("float");
  });

  it("rejects documents that are not metric maps", () => {
    expect(() => metricFromDocument([1, 2], "inline")).toThrow("must hold a mapping");
    expect(() => metricFromDocument({ "/Host#cpu": "high" }, "inline")).toThrow("Value for '/Host#cpu' in inline");
    expect(() => metricFromDocument({ uptime: 5 }, "inline")).toThrow("holds a single metric");
  });

  it("fails for a missing metrics file", async () => {
    await expect(readMetricsFile(resolve(FIXTURES, "metrics/absent.json"))).rejects.toThrow("does not exist");
  });
});

describe("parseValidateArgs", () => {
  it("collects repeated rule patterns", () => {
    expect(
      parseValidateArgs(["--rules", "a.yaml", "--rules", "rules/*.yml", "--metrics", "m.json", "--store", ".store"], BASE_CONFIG)
    ).toEqual({ rules: ["a.yaml", "rules/*.yml"], metrics: "m.json", storeDir: ".store", project: null });
  });

  it("falls back to the runtime configuration", () => {
    const config: RuntimeConfig = { ...BASE_CONFIG, rulesPaths: ["env.yaml"], storeDir: "/tmp/store", project: "demo" };
    expect(parseValidateArgs(["--metrics", "m.json"], config)).toEqual({
      rules: ["env.yaml"],
      metrics: "m.json",
      storeDir: "/tmp/store",
      project: "demo"
    });
  });

  it("requires rules and metrics", () => {
    expect(() => parseValidateArgs(["--metrics", "m.json"], BASE_CONFIG)).toThrow(VALIDATE_USAGE);
    expect(() => parseValidateArgs(["--rules", "a.yaml"], BASE_CONFIG)).toThrow(VALIDATE_USAGE);
    expect(() => parseValidateArgs(["--rules", "--metrics", "m.json"], BASE_CONFIG)).toThrow("Missing value for --rules");
    expect(() => parseValidateArgs(["--verbose"], BASE_CONFIG)).toThrow("Unknown argument '--verbose'");
  });
});
