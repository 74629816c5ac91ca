#!/usr/bin/env node
import { resolveRuntimeConfig } from "../config/env.js";
import { systemInfo } from "../metrics/metadata.js";
import { loadRulesEngine } from "../rules/loader.js";
import { JsonMetricStore } from "../store/json-store.js";
import { logger, setLogLevel } from "../utils/logger.js";
import { formatReport, parseValidateArgs, readMetricsFile, validateMetrics } from "../validate_metrics.js";

async function main(): Promise<void> {
  const config = resolveRuntimeConfig();
  setLogLevel(config.logLevel);
  const args = parseValidateArgs(process.argv.slice(2), config);
  logger.info("Validating metrics", { metrics: args.metrics, rules: args.rules });

  const engine = await loadRulesEngine(args.rules);
  const metric = await readMetricsFile(args.metrics);
  const outcome = validateMetrics(metric, engine);
  console.log(formatReport(outcome));

  if (args.storeDir) {
    const store = await JsonMetricStore.open(args.storeDir);
    store.post(metric, {
      metadata: systemInfo(),
      ...(args.project ? { project: args.project } : {})
    });
    await store.commit();
    logger.info("Recorded metric snapshot", { store: store.path, name: metric.name });
  }

  if (!outcome.passed) {
    logger.error("Metric validation failed", { failures: outcome.failures.length });
    process.exitCode = 1;
    return;
  }
  logger.info("Metric validation passed", { alerts: outcome.alerts.length });
}

void main().catch((error) => {
  logger.error("Metric validation aborted", { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
