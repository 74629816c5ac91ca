import type {
  FieldSpec,
  MapFieldSpec,
  NumericKind,
  RecordFieldSpec,
  RecordSchema,
  ScalarFieldSpec,
  StructuredRecord,
  StructuredValue
} from "lib/metrics/types.js";

import { StructuredConversionError } from "../errors.js";
import { CompositeMetric, Metric, type AnyMetric } from "./composite.js";

export function scalar(numeric?: NumericKind, optional = false): ScalarFieldSpec {
  return { kind: "scalar", numeric, optional };
}

export function record(fields: RecordSchema, optional = false): RecordFieldSpec {
  return { kind: "record", fields, optional };
}

export function map(values: FieldSpec, optional = false): MapFieldSpec {
  return { kind: "map", values, optional };
}

function describeValue(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }
  if (Array.isArray(value)) {
    return "an array";
  }
  switch (typeof value) {
    case "number":
      return Number.isFinite(value) ? "a number" : String(value);
    case "object":
      return "a record";
    default:
      return `a ${typeof value}`;
  }
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectRecord(name: string, value: unknown, expected: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new StructuredConversionError(name, `Field '${name}' expects ${expected} but got ${describeValue(value)}`);
  }
  return value;
}

function lookupField(fields: RecordSchema, name: string): FieldSpec | undefined {
  return Object.hasOwn(fields, name) ? fields[name] : undefined;
}

/**
 * Build a metric tree from a plain record.
 *
 * With a field spec the conversion follows the schema: scalar fields become
 * leaves, record fields become composites with fixed children and map fields
 * become composites with one child per key. Without a spec numbers become
 * leaves and objects become composites. Any other value is a
 * StructuredConversionError.
 */
export function fromStructured(name: string, value: unknown, spec?: FieldSpec): AnyMetric {
  if (!spec) {
    if (isFiniteNumber(value)) {
      return new Metric(name, value);
    }
    const fields = expectRecord(name, value, "a number or a record");
    const composite = new CompositeMetric(name);
    for (const [key, child] of Object.entries(fields)) {
      if (child !== undefined) {
        composite.add(fromStructured(key, child));
      }
    }
    return composite;
  }

  switch (spec.kind) {
    case "scalar": {
      if (!isFiniteNumber(value)) {
        throw new StructuredConversionError(name, `Field '${name}' expects a number but got ${describeValue(value)}`);
      }
      if (spec.numeric === "int" && !Number.isInteger(value)) {
        throw new StructuredConversionError(name, `Field '${name}' expects an integer but got ${value}`);
      }
      return new Metric(name, value, spec.numeric);
    }
    case "record": {
      const fields = expectRecord(name, value, "a record");
      const composite = new CompositeMetric(name);
      for (const key of Object.keys(fields)) {
        if (fields[key] !== undefined && !lookupField(spec.fields, key)) {
          throw new StructuredConversionError(key, `Schema for '${name}' has no field named '${key}'`);
        }
      }
      for (const [field, fieldSpec] of Object.entries(spec.fields)) {
        const fieldValue = fields[field];
        if (fieldValue === undefined) {
          if (fieldSpec.optional) {
            continue;
          }
          throw new StructuredConversionError(field, `Missing required field '${field}' in '${name}'`);
        }
        composite.add(fromStructured(field, fieldValue, fieldSpec));
      }
      return composite;
    }
    case "map": {
      const entries = expectRecord(name, value, "a map");
      const composite = new CompositeMetric(name);
      for (const [key, entry] of Object.entries(entries)) {
        if (entry !== undefined) {
          composite.add(fromStructured(key, entry, spec.values));
        }
      }
      return composite;
    }
  }
}

function convertField(child: AnyMetric, spec: FieldSpec, location: string): StructuredValue {
  switch (spec.kind) {
    case "scalar":
      if (!(child instanceof Metric)) {
        throw new StructuredConversionError(location, `Expected simple metric but found composite for field ${location}`);
      }
      return spec.numeric === "int" ? Math.trunc(child.value) : child.value;
    case "record":
      if (!(child instanceof CompositeMetric)) {
        throw new StructuredConversionError(location, `Field ${location} is not composite as expected by its schema`);
      }
      return convertRecord(child, spec.fields, location);
    case "map":
      if (!(child instanceof CompositeMetric)) {
        throw new StructuredConversionError(location, `Field ${location} is not composite as expected by its schema`);
      }
      return convertMap(child, spec.values, location);
  }
}

function convertRecord(composite: CompositeMetric, fields: RecordSchema, location: string): StructuredRecord {
  const result: StructuredRecord = {};
  for (const [key, child] of composite.entries()) {
    const spec = lookupField(fields, key);
    if (!spec) {
      throw new StructuredConversionError(`${location}.${key}`, `Schema for ${location} has no field named '${key}'`);
    }
    result[key] = convertField(child, spec, `${location}.${key}`);
  }
  for (const [field, spec] of Object.entries(fields)) {
    if (!composite.has(field) && !spec.optional) {
      throw new StructuredConversionError(`${location}.${field}`, `Missing required field ${location}.${field}`);
    }
  }
  return result;
}

function convertMap(composite: CompositeMetric, values: FieldSpec, location: string): StructuredRecord {
  const result: StructuredRecord = {};
  for (const [key, child] of composite.entries()) {
    result[key] = convertField(child, values, `${location}.${key}`);
  }
  return result;
}

/** Convert a composite into a plain record described by `schema`. */
export function toStructured(metric: CompositeMetric, schema: RecordSchema): StructuredRecord {
  return convertRecord(metric, schema, metric.name);
}

/** Convert a composite whose children form a dynamic set of uniform values. */
export function toStructuredMap(metric: CompositeMetric, values: FieldSpec): StructuredRecord {
  return convertMap(metric, values, metric.name);
}
