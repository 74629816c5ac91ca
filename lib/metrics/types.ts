export type MetricPath = string;

export type NumericKind = "int" | "float";

export type TaggedNumber =
  | { kind: "int"; value: number }
  | { kind: "float"; value: number };

export type FlattenedMetrics = Record<MetricPath, number>;

export type TaggedFlattenedMetrics = Record<MetricPath, TaggedNumber>;

export type MetadataValue = string | number;

export type MetadataValues = Record<string, MetadataValue>;

// Structured conversion schemas

export interface ScalarFieldSpec {
  kind: "scalar";
  numeric?: NumericKind;
  optional?: boolean;
}

export interface RecordFieldSpec {
  kind: "record";
  fields: RecordSchema;
  optional?: boolean;
}

export interface MapFieldSpec {
  kind: "map";
  values: FieldSpec;
  optional?: boolean;
}

export type FieldSpec = ScalarFieldSpec | RecordFieldSpec | MapFieldSpec;

export interface RecordSchema {
  [field: string]: FieldSpec;
}

export type StructuredValue = number | StructuredRecord;

export interface StructuredRecord {
  [field: string]: StructuredValue | undefined;
}

// Rule documents

export type RuleAction = "confirm" | "validate";

export interface RuleEntry {
  action: string;
  rule: string;
}

export interface RuleExclusionEntry {
  exclusion: string;
}

export interface RuleSet {
  description?: string;
  exclusions?: RuleExclusionEntry[];
  rules: RuleEntry[];
}

export interface RulesDocument {
  content: Array<{ ruleset: RuleSet }>;
}

// Persisted snapshots

export interface SnapshotRecord {
  name: string;
  timestamp: string;
  project?: string;
  uuid?: string;
  metadata: MetadataValues;
  values: TaggedFlattenedMetrics;
}

export interface StoreDocument {
  version: 1;
  snapshots: SnapshotRecord[];
}
