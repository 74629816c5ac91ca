import type { MetadataValue, MetadataValues, RecordSchema, StructuredRecord } from "lib/metrics/types.js";

import type { AnyMetric } from "../metrics/composite.js";

export type MetadataComparison = "==" | "<>" | "<" | ">" | "<=" | ">=";

export interface MetadataFilter {
  name: string;
  value: MetadataValue;
  comparison: MetadataComparison;
}

export interface PostOptions {
  /** Defaults to the time of posting. */
  timestamp?: Date;
  metadata?: MetadataValues;
  project?: string;
  /** Correlates the snapshot with data held elsewhere. */
  uuid?: string;
}

export interface StoredMetric {
  metric: AnyMetric;
  timestamp: Date;
  metadata: MetadataValues;
  project?: string;
  uuid?: string;
}

/** A snapshot converted to a plain record through a schema. */
export interface StoredData extends Omit<StoredMetric, "metric"> {
  data: StructuredRecord;
}

/**
 * Values of selected leaves across snapshots, oldest first. A leaf missing
 * from a snapshot is skipped, so its series can be shorter than `timestamps`.
 */
export interface FieldSeries {
  timestamps: Date[];
  metadata: MetadataValues[];
  values: Record<string, number[]>;
}

/**
 * Persistence for metric snapshots. Only the flattened path/value form is
 * stored; reads rebuild the tree. Query results are sorted newest first and
 * restricted by the active metadata filters.
 */
export interface MetricStore {
  post(metric: AnyMetric, options?: PostOptions): void;
  postStructured(name: string, data: StructuredRecord, schema: RecordSchema, options?: PostOptions): void;
  metricsByDate(name: string, oldest: Date, newest?: Date): StoredMetric[];
  metricsByVolume(name: string, count: number): StoredMetric[];
  dataByDate(name: string, schema: RecordSchema, oldest: Date, newest?: Date): StoredData[];
  dataByVolume(name: string, schema: RecordSchema, count: number): StoredData[];
  /**
   * @param fields globs over flattened paths; all leaves when omitted
   * @param count newest snapshots to include; all when omitted
   */
  fieldSeries(name: string, fields?: readonly string[], count?: number): FieldSeries;
  /** @returns number of snapshots removed */
  purgeByDate(before: Date, name?: string): number;
  /**
   * Keep at most `count` of the newest snapshots per metric name.
   *
   * @returns number of snapshots removed
   */
  purgeByVolume(count: number, name?: string): number;
  filterOnMetadata(name: string, value: MetadataValue, comparison?: MetadataComparison): this;
  clearFilter(name: string): this;
  commit(): Promise<void>;
}
