export type {
  FieldSpec,
  FlattenedMetrics,
  MetadataValue,
  MetadataValues,
  NumericKind,
  RecordSchema,
  RulesDocument,
  StructuredRecord,
  StructuredValue,
  TaggedFlattenedMetrics,
  TaggedNumber
} from "lib/metrics/types.js";

export * from "./errors.js";
export { BasicMetric, CompositeMetric, Metric, type AnyMetric } from "./metrics/composite.js";
export {
  decodeFlattened,
  encodeFlattened,
  formatMetricPath,
  fromFlattened,
  isTaggedNumber,
  parseMetricPath,
  toTagged,
  type ParsedPath
} from "./metrics/codec.js";
export { fromStructured, map, record, scalar, toStructured, toStructuredMap } from "./metrics/structured.js";
export { systemInfo } from "./metrics/metadata.js";
export { Evaluation, Rule, ThresholdViolation, parseRule, rootedPath } from "./rules/rule.js";
export { StatusLevel, ValidationStatus } from "./rules/status.js";
export { RulesEngine } from "./rules/engine.js";
export { loadRulesEngine, loadRulesFile, type LoadRulesOptions } from "./rules/loader.js";
export { JsonMetricStore } from "./store/json-store.js";
export type {
  FieldSeries,
  MetadataComparison,
  MetricStore,
  PostOptions,
  StoredData,
  StoredMetric
} from "./store/types.js";
export { resolveRuntimeConfig, type RuntimeConfig } from "./config/env.js";
export { formatReport, metricFromDocument, readMetricsFile, validateMetrics, type ValidationOutcome } from "./validate_metrics.js";
export { logger, setLogLevel, type LogLevel } from "./utils/logger.js";
