import type { FlattenedMetrics, NumericKind, TaggedNumber } from "lib/metrics/types.js";

import { LEAF_MARKER, PATH_SEPARATOR } from "../constants.js";
import { MetricConstructionError, MetricLookupError, StructuralConflictError } from "../errors.js";

export type AnyMetric = Metric | CompositeMetric;

// each attached metric has exactly one parent
const owners = new WeakMap<AnyMetric, CompositeMetric>();

function validateName(name: string, reserved: string[], label: string): string {
  if (typeof name !== "string" || name.length === 0) {
    throw new MetricConstructionError(`${label} name cannot be empty`, "INVALID_NAME");
  }
  const found = reserved.filter((character) => name.includes(character));
  if (found.length > 0) {
    throw new MetricConstructionError(
      `${label} name '${name}' cannot contain ${reserved.map((character) => `'${character}'`).join(" or ")}`,
      "INVALID_NAME"
    );
  }
  return name;
}

export abstract class BasicMetric {
  readonly name: string;

  protected constructor(name: string) {
    this.name = name;
  }

  /**
   * Flatten the hierarchy into path/value pairs.
   *
   * @param prefix only used while recursing; callers leave it empty
   */
  abstract flatten(prefix?: string): FlattenedMetrics;

  abstract equals(other: AnyMetric): boolean;
}

/**
 * Leaf metric: one named scalar. The numeric kind is kept apart from the value
 * so that an integer count and a float measurement survive storage unchanged.
 */
export class Metric extends BasicMetric {
  readonly value: number;
  readonly kind: NumericKind;

  constructor(name: string, value: number, kind?: NumericKind) {
    super(validateName(name, [LEAF_MARKER], "Metric"));
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new MetricConstructionError(
        `Metric values must be finite numbers; got ${String(value)} for '${name}'`,
        "INVALID_VALUE"
      );
    }
    if (kind === "int" && !Number.isInteger(value)) {
      throw new MetricConstructionError(`Metric '${name}' is declared int but has value ${value}`, "INVALID_VALUE");
    }
    this.value = value;
    this.kind = kind ?? (Number.isInteger(value) ? "int" : "float");
  }

  tagged(): TaggedNumber {
    return this.kind === "int" ? { kind: "int", value: this.value } : { kind: "float", value: this.value };
  }

  flatten(prefix = ""): FlattenedMetrics {
    if (prefix) {
      return { [`${prefix}${LEAF_MARKER}${this.name}`]: this.value };
    }
    return { [this.name]: this.value };
  }

  equals(other: AnyMetric): boolean {
    if (this === other) {
      return true;
    }
    return other instanceof Metric && this.name === other.name && this.value === other.value;
  }
}

/**
 * Branch metric holding uniquely named Metric or CompositeMetric children.
 *
 * Children are addressed by relative key paths of the form
 * `child/grandchild#leaf`, where `/` separates composites and a single `#`
 * marks the final leaf. The flattened (absolute) form adds the root:
 * `/Root/child/grandchild#leaf`.
 */
export class CompositeMetric extends BasicMetric {
  private readonly children = new Map<string, AnyMetric>();

  constructor(name: string, children: Iterable<AnyMetric> = []) {
    super(validateName(name, [LEAF_MARKER, PATH_SEPARATOR], "Composite metric"));
    for (const child of children) {
      this.add(child);
    }
  }

  get size(): number {
    return this.children.size;
  }

  has(name: string): boolean {
    return this.children.has(name);
  }

  get(name: string): AnyMetric | undefined {
    return this.children.get(name);
  }

  names(): string[] {
    return Array.from(this.children.keys());
  }

  values(): IterableIterator<AnyMetric> {
    return this.children.values();
  }

  entries(): IterableIterator<[string, AnyMetric]> {
    return this.children.entries();
  }

  /**
   * Attach a child and return it. Names must be unique among siblings, a
   * composite can not be attached below itself and a metric already attached
   * elsewhere must be removed from its parent first.
   */
  add<T extends AnyMetric>(child: T): T {
    if (this.children.has(child.name)) {
      throw new StructuralConflictError(
        `Composite metric '${this.name}' already has a child named '${child.name}'`,
        "DUPLICATE_CHILD"
      );
    }
    const owner = owners.get(child);
    if (owner) {
      throw new StructuralConflictError(
        `'${child.name}' already belongs to composite metric '${owner.name}'`,
        "SHARED_CHILD"
      );
    }
    const self: CompositeMetric = this;
    if (child instanceof CompositeMetric && (child === self || child.contains(self))) {
      throw new StructuralConflictError(
        `Adding '${child.name}' to '${this.name}' would create a cycle`,
        "CYCLE"
      );
    }
    this.children.set(child.name, child);
    owners.set(child, self);
    return child;
  }

  addKeyValue(name: string, value: number, kind?: NumericKind): Metric {
    return this.add(new Metric(name, value, kind));
  }

  remove(name: string): AnyMetric {
    const child = this.child(name);
    this.children.delete(name);
    owners.delete(child);
    return child;
  }

  child(name: string): AnyMetric {
    const child = this.children.get(name);
    if (!child) {
      throw new MetricLookupError(name, `'${name}' not found in composite metric '${this.name}'`);
    }
    return child;
  }

  element(keyPath: string): AnyMetric {
    if (keyPath.startsWith(PATH_SEPARATOR)) {
      throw new MetricLookupError(keyPath, `Key path must be relative and not start with '/': ${keyPath}`, "MALFORMED_PATH");
    }
    const parts = keyPath.split(LEAF_MARKER);
    if (parts.length > 2) {
      throw new MetricLookupError(keyPath, `Key path must contain at most one '#': ${keyPath}`, "MALFORMED_PATH");
    }
    if (parts.length === 1 && !keyPath.includes(PATH_SEPARATOR)) {
      return this.child(keyPath);
    }

    const location = parts[0];
    const leafName = parts.length === 2 ? parts[1] : undefined;
    let node: CompositeMetric = this;
    for (const segment of location.split(PATH_SEPARATOR).filter(Boolean)) {
      const next = node.children.get(segment);
      if (!next) {
        throw new MetricLookupError(keyPath, `${keyPath} not found in composite metric '${this.name}'`);
      }
      if (!(next instanceof CompositeMetric)) {
        throw new MetricLookupError(
          keyPath,
          `${keyPath} not found in composite metric '${this.name}': '${segment}' is not a composite`
        );
      }
      node = next;
    }
    if (leafName === undefined) {
      return node;
    }
    const leaf = node.children.get(leafName);
    if (!(leaf instanceof Metric)) {
      throw new MetricLookupError(keyPath, `${keyPath} does not name a leaf metric in '${this.name}'`);
    }
    return leaf;
  }

  metric(keyPath: string): Metric {
    const found = this.element(keyPath);
    if (!(found instanceof Metric)) {
      throw new MetricLookupError(keyPath, `${keyPath} names a composite, not a leaf metric`);
    }
    return found;
  }

  composite(keyPath: string): CompositeMetric {
    const found = this.element(keyPath);
    if (!(found instanceof CompositeMetric)) {
      throw new MetricLookupError(keyPath, `${keyPath} names a leaf, not a composite metric`);
    }
    return found;
  }

  /**
   * @param coreOnly when true only leaf paths are returned; otherwise the
   *   paths of intermediate composites are included as well
   * @returns paths relative to this composite, in depth-first order
   */
  keys(coreOnly = false): Set<string> {
    const result = new Set<string>();
    this.collectKeys(coreOnly, "", result);
    return result;
  }

  flatten(prefix = ""): FlattenedMetrics {
    const path = `${prefix}${PATH_SEPARATOR}${this.name}`;
    const result: FlattenedMetrics = {};
    for (const child of this.children.values()) {
      Object.assign(result, child.flatten(path));
    }
    return result;
  }

  equals(other: AnyMetric): boolean {
    if (this === other) {
      return true;
    }
    if (!(other instanceof CompositeMetric) || this.name !== other.name || this.size !== other.size) {
      return false;
    }
    for (const [name, child] of this.children) {
      const counterpart = other.children.get(name);
      if (!counterpart || !child.equals(counterpart)) {
        return false;
      }
    }
    return true;
  }

  private contains(target: CompositeMetric): boolean {
    for (const child of this.children.values()) {
      if (child instanceof CompositeMetric && (child === target || child.contains(target))) {
        return true;
      }
    }
    return false;
  }

  private collectKeys(coreOnly: boolean, root: string, result: Set<string>): void {
    for (const [name, child] of this.children) {
      if (child instanceof Metric) {
        // leaves directly under this node still carry the '#' marker
        result.add(`${root}${LEAF_MARKER}${name}`);
        continue;
      }
      const nextRoot = root ? `${root}${PATH_SEPARATOR}${name}` : name;
      if (!coreOnly) {
        result.add(nextRoot);
      }
      child.collectKeys(coreOnly, nextRoot, result);
    }
  }
}
