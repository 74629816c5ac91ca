import { join } from "node:path";

import type { MetadataValue, MetadataValues, RecordSchema, SnapshotRecord, StoreDocument, StructuredRecord } from "lib/metrics/types.js";

import { STORE_DOCUMENT_VERSION, STORE_FILE_NAME } from "../constants.js";
import { validateStoreDocument } from "../contracts/validators.js";
import { MetricStoreError } from "../errors.js";
import { decodeFlattened, encodeFlattened } from "../metrics/codec.js";
import { CompositeMetric, type AnyMetric } from "../metrics/composite.js";
import { fromStructured, toStructured } from "../metrics/structured.js";
import { globMatcher } from "../utils/glob.js";
import { readJsonFile, writeJsonFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import type {
  FieldSeries,
  MetadataComparison,
  MetadataFilter,
  MetricStore,
  PostOptions,
  StoredData,
  StoredMetric
} from "./types.js";

function order(actual: MetadataValue, expected: MetadataValue): number | null {
  if (typeof actual === "number" && typeof expected === "number") {
    return actual - expected;
  }
  if (typeof actual === "string" && typeof expected === "string") {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  // mixed types are never ordered
  return null;
}

function compareMetadata(actual: MetadataValue | undefined, filter: MetadataFilter): boolean {
  if (actual === undefined) {
    return false;
  }
  const difference = order(actual, filter.value);
  switch (filter.comparison) {
    case "==":
      return actual === filter.value;
    case "<>":
      return actual !== filter.value;
    case "<":
      return difference !== null && difference < 0;
    case ">":
      return difference !== null && difference > 0;
    case "<=":
      return difference !== null && difference <= 0;
    case ">=":
      return difference !== null && difference >= 0;
  }
}

function validateMetadata(metadata: MetadataValues): MetadataValues {
  for (const [name, value] of Object.entries(metadata)) {
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new MetricStoreError(`Metadata '${name}' must be a finite number or a string`);
    }
  }
  return { ...metadata };
}

function timestampOf(snapshot: SnapshotRecord): number {
  return Date.parse(snapshot.timestamp);
}

function validateCount(count: number): number {
  if (!Number.isInteger(count) || count < 0) {
    throw new MetricStoreError(`Count must be a non-negative integer; got ${count}`);
  }
  return count;
}

function newestFirst(left: SnapshotRecord, right: SnapshotRecord): number {
  return timestampOf(right) - timestampOf(left);
}

function toStoredData(stored: StoredMetric, schema: RecordSchema): StoredData {
  const { metric, ...rest } = stored;
  if (!(metric instanceof CompositeMetric)) {
    throw new MetricStoreError(`Snapshot of '${metric.name}' holds a single metric and has no fields`);
  }
  return { ...rest, data: toStructured(metric, schema) };
}

/**
 * Metric store backed by a single JSON document. Changes are buffered in
 * memory until `commit()` writes the document back.
 */
export class JsonMetricStore implements MetricStore {
  private readonly filters = new Map<string, MetadataFilter>();
  private dirty = false;

  private constructor(
    readonly path: string,
    private snapshots: SnapshotRecord[]
  ) {}

  static async open(directory: string): Promise<JsonMetricStore> {
    const path = join(directory, STORE_FILE_NAME);
    let document: unknown;
    try {
      document = await readJsonFile(path);
    } catch (error) {
      throw new MetricStoreError(`Unable to read metric store at ${path}`, error);
    }
    if (document === null) {
      logger.debug("Creating new metric store", { path });
      return new JsonMetricStore(path, []);
    }
    const result = validateStoreDocument(document);
    if (!result.valid) {
      throw new MetricStoreError(`Invalid metric store at ${path}: ${result.errors.join("; ")}`);
    }
    logger.debug("Opened metric store", { path, snapshots: result.value.snapshots.length });
    return new JsonMetricStore(path, [...result.value.snapshots]);
  }

  get size(): number {
    return this.snapshots.length;
  }

  post(metric: AnyMetric, options: PostOptions = {}): void {
    const timestamp = options.timestamp ?? new Date();
    if (Number.isNaN(timestamp.getTime())) {
      throw new MetricStoreError(`Invalid timestamp for metric '${metric.name}'`);
    }
    const snapshot: SnapshotRecord = {
      name: metric.name,
      timestamp: timestamp.toISOString(),
      metadata: validateMetadata(options.metadata ?? {}),
      values: encodeFlattened(metric)
    };
    if (options.project !== undefined) {
      snapshot.project = options.project;
    }
    if (options.uuid !== undefined) {
      snapshot.uuid = options.uuid;
    }
    this.snapshots.push(snapshot);
    this.dirty = true;
  }

  postStructured(name: string, data: StructuredRecord, schema: RecordSchema, options: PostOptions = {}): void {
    this.post(fromStructured(name, data, { kind: "record", fields: schema }), options);
  }

  metricsByDate(name: string, oldest: Date, newest: Date = new Date()): StoredMetric[] {
    const from = oldest.getTime();
    const to = newest.getTime();
    return this.select(name)
      .filter((snapshot) => {
        const time = timestampOf(snapshot);
        return time >= from && time <= to;
      })
      .map((snapshot) => this.toStoredMetric(snapshot));
  }

  metricsByVolume(name: string, count: number): StoredMetric[] {
    return this.select(name)
      .slice(0, validateCount(count))
      .map((snapshot) => this.toStoredMetric(snapshot));
  }

  dataByDate(name: string, schema: RecordSchema, oldest: Date, newest?: Date): StoredData[] {
    return this.metricsByDate(name, oldest, newest).map((stored) => toStoredData(stored, schema));
  }

  dataByVolume(name: string, schema: RecordSchema, count: number): StoredData[] {
    return this.metricsByVolume(name, count).map((stored) => toStoredData(stored, schema));
  }

  fieldSeries(name: string, fields?: readonly string[], count?: number): FieldSeries {
    const isSelected: (path: string) => boolean = fields === undefined ? () => true : globMatcher(fields);
    const selected = this.select(name);
    const snapshots = (count === undefined ? selected : selected.slice(0, validateCount(count))).reverse();
    const series: FieldSeries = { timestamps: [], metadata: [], values: {} };
    for (const snapshot of snapshots) {
      series.timestamps.push(new Date(snapshot.timestamp));
      series.metadata.push({ ...snapshot.metadata });
      for (const [path, tagged] of Object.entries(snapshot.values)) {
        if (isSelected(path)) {
          const values = series.values[path] ?? [];
          values.push(tagged.value);
          series.values[path] = values;
        }
      }
    }
    return series;
  }

  purgeByDate(before: Date, name?: string): number {
    const limit = before.getTime();
    return this.removeWhere(
      (snapshot) => timestampOf(snapshot) < limit && (name === undefined || snapshot.name === name)
    );
  }

  purgeByVolume(count: number, name?: string): number {
    validateCount(count);
    const names = name === undefined ? new Set(this.snapshots.map((snapshot) => snapshot.name)) : new Set([name]);
    const doomed = new Set<SnapshotRecord>();
    for (const current of names) {
      this.snapshots
        .filter((snapshot) => snapshot.name === current)
        .sort(newestFirst)
        .slice(count)
        .forEach((snapshot) => doomed.add(snapshot));
    }
    return this.removeWhere((snapshot) => doomed.has(snapshot));
  }

  filterOnMetadata(name: string, value: MetadataValue, comparison: MetadataComparison = "=="): this {
    if (this.filters.has(name)) {
      throw new MetricStoreError(`A filter on metadata '${name}' is already active; clear it first`);
    }
    this.filters.set(name, { name, value, comparison });
    return this;
  }

  clearFilter(name: string): this {
    this.filters.delete(name);
    return this;
  }

  async commit(): Promise<void> {
    if (!this.dirty) {
      return;
    }
    const document: StoreDocument = {
      version: STORE_DOCUMENT_VERSION,
      snapshots: this.snapshots
    };
    try {
      await writeJsonFile(this.path, document);
    } catch (error) {
      throw new MetricStoreError(`Unable to write metric store at ${this.path}`, error);
    }
    this.dirty = false;
    logger.debug("Committed metric store", { path: this.path, snapshots: this.snapshots.length });
  }

  private select(name: string): SnapshotRecord[] {
    const filters = Array.from(this.filters.values());
    return this.snapshots
      .filter((snapshot) => snapshot.name === name)
      .filter((snapshot) => filters.every((filter) => compareMetadata(snapshot.metadata[filter.name], filter)))
      .sort(newestFirst);
  }

  private removeWhere(predicate: (snapshot: SnapshotRecord) => boolean): number {
    const before = this.snapshots.length;
    this.snapshots = this.snapshots.filter((snapshot) => !predicate(snapshot));
    const removed = before - this.snapshots.length;
    if (removed > 0) {
      this.dirty = true;
    }
    return removed;
  }

  private toStoredMetric(snapshot: SnapshotRecord): StoredMetric {
    const stored: StoredMetric = {
      metric: decodeFlattened(snapshot.values),
      timestamp: new Date(snapshot.timestamp),
      metadata: { ...snapshot.metadata }
    };
    if (snapshot.project !== undefined) {
      stored.project = snapshot.project;
    }
    if (snapshot.uuid !== undefined) {
      stored.uuid = snapshot.uuid;
    }
    return stored;
  }
}
