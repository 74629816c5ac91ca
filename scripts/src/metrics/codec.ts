import type {
  FlattenedMetrics,
  NumericKind,
  TaggedFlattenedMetrics,
  TaggedNumber
} from "lib/metrics/types.js";

import { LEAF_MARKER, PATH_SEPARATOR } from "../constants.js";
import { StructuralConflictError } from "../errors.js";
import { CompositeMetric, Metric, type AnyMetric } from "./composite.js";

interface FlatEntry {
  path: string;
  value: number;
  kind?: NumericKind;
}

export interface ParsedPath {
  /** Composite chain from the root down, root name first. */
  segments: string[];
  leaf: string;
}

export function parseMetricPath(path: string): ParsedPath {
  const parts = path.split(LEAF_MARKER);
  if (parts.length !== 2) {
    throw new StructuralConflictError(`Composite metric path must contain exactly one '#': ${path}`, "MALFORMED_PATH");
  }
  const [location, leaf] = parts;
  if (!location.startsWith(PATH_SEPARATOR)) {
    throw new StructuralConflictError(`Composite metric path must start with '/': ${path}`, "MALFORMED_PATH");
  }
  const segments = location.slice(1).split(PATH_SEPARATOR);
  if (segments.some((segment) => segment.length === 0)) {
    throw new StructuralConflictError(`Composite metric path has an empty segment: ${path}`, "MALFORMED_PATH");
  }
  return { segments, leaf };
}

export function formatMetricPath(segments: string[], leaf: string): string {
  return `${PATH_SEPARATOR}${segments.join(PATH_SEPARATOR)}${LEAF_MARKER}${leaf}`;
}

function unflatten(entries: FlatEntry[]): AnyMetric {
  if (entries.length === 0) {
    throw new StructuralConflictError("Empty value set when constructing a metric", "EMPTY_INPUT");
  }
  if (entries.length === 1 && !entries[0].path.includes(LEAF_MARKER)) {
    const [{ path, value, kind }] = entries;
    return new Metric(path, value, kind);
  }

  let root: CompositeMetric | null = null;
  for (const { path, value, kind } of entries) {
    const { segments, leaf } = parseMetricPath(path);
    const [rootName, ...chain] = segments;
    if (root === null) {
      root = new CompositeMetric(rootName);
    } else if (rootName !== root.name) {
      throw new StructuralConflictError(`More than one root found: ${root.name} and ${rootName}`);
    }

    let base: CompositeMetric = root;
    for (const segment of chain) {
      const existing = base.get(segment);
      if (existing === undefined) {
        base = base.add(new CompositeMetric(segment));
      } else if (existing instanceof CompositeMetric) {
        base = existing;
      } else {
        throw new StructuralConflictError(`Mixed composite and leaf nodes at same level: ${path}`);
      }
    }
    if (base.has(leaf)) {
      throw new StructuralConflictError(`Mixed composite and leaf nodes at same level: ${path}`);
    }
    base.add(new Metric(leaf, value, kind));
  }

  if (root === null) {
    throw new StructuralConflictError("No data to process", "EMPTY_INPUT");
  }
  return root;
}

/**
 * Rebuild a metric from the output of `flatten()`. A single entry without a
 * `#` yields a bare Metric; anything else must describe exactly one root
 * composite. Any conflict aborts the whole conversion.
 */
export function fromFlattened(values: FlattenedMetrics): AnyMetric {
  return unflatten(Object.entries(values).map(([path, value]) => ({ path, value })));
}

export function toTagged(value: number, kind?: NumericKind): TaggedNumber {
  const resolved = kind ?? (Number.isInteger(value) ? "int" : "float");
  return resolved === "int" ? { kind: "int", value } : { kind: "float", value };
}

export function isTaggedNumber(value: unknown): value is TaggedNumber {
  if (typeof value !== "object" || value === null || !("kind" in value) || !("value" in value)) {
    return false;
  }
  return (value.kind === "int" || value.kind === "float") && typeof value.value === "number";
}

export function encodeFlattened(metric: AnyMetric): TaggedFlattenedMetrics {
  const result: TaggedFlattenedMetrics = {};
  if (metric instanceof Metric) {
    result[metric.name] = metric.tagged();
    return result;
  }
  collectTagged(metric, "", result);
  return result;
}

function collectTagged(composite: CompositeMetric, prefix: string, result: TaggedFlattenedMetrics): void {
  const path = `${prefix}${PATH_SEPARATOR}${composite.name}`;
  for (const child of composite.values()) {
    if (child instanceof Metric) {
      result[`${path}${LEAF_MARKER}${child.name}`] = child.tagged();
    } else {
      collectTagged(child, path, result);
    }
  }
}

export function decodeFlattened(values: TaggedFlattenedMetrics): AnyMetric {
  return unflatten(
    Object.entries(values).map(([path, tagged]) => ({ path, value: tagged.value, kind: tagged.kind }))
  );
}
