import { describe, expect, it } from "vitest";

import { StructuralConflictError } from "../src/errors.js";
import {
  decodeFlattened,
  encodeFlattened,
  formatMetricPath,
  fromFlattened,
  isTaggedNumber,
  parseMetricPath,
  toTagged
} from "../src/metrics/codec.js";
import { CompositeMetric, Metric } from "../src/metrics/composite.js";

function sampleTree(): CompositeMetric {
  return new CompositeMetric("Build", [
    new Metric("duration", 12.25),
    new CompositeMetric("tests", [
      new Metric("passed", 120),
      new Metric("failed", 2),
      new CompositeMetric("coverage", [new Metric("lines", 81.5), new Metric("branches", 64.0, "float")])
    ])
  ]);
}

describe("path parsing", () => {
  it("splits a path into its composite chain and leaf", () => {
    expect(parseMetricPath("/Build/tests/coverage#lines")).toEqual({
      segments: ["Build", "tests", "coverage"],
      leaf: "lines"
    });
    expect(formatMetricPath(["Build", "tests"], "passed")).toBe("/Build/tests#passed");
  });

  it.each(["Build#x", "/Build#x#y", "/Build/tests", "/Build//tests#x"])("rejects malformed path %s", (path) => {
    expect(() => parseMetricPath(path)).toThrow(StructuralConflictError);
  });
});

describe("fromFlattened", () => {
  it("rebuilds a tree equal to the one that was flattened", () => {
    const tree = sampleTree();
    const rebuilt = fromFlattened(tree.flatten());
    expect(rebuilt.equals(tree)).toBe(true);
    expect(rebuilt.flatten()).toEqual(tree.flatten());
  });

  it("returns a bare metric for a single entry without a leaf marker", () => {
    const metric = fromFlattened({ uptime: 3600 });
    expect(metric).toBeInstanceOf(Metric);
    expect(metric.equals(new Metric("uptime", 3600))).toBe(true);
  });

  it("fails on empty input", () => {
    try {
      fromFlattened({});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StructuralConflictError);
      expect(error).toHaveProperty("code", "EMPTY_INPUT");
    }
  });

  it("fails when more than one root is present", () => {
    expect(() => fromFlattened({ "/A#x": 1, "/B#y": 2 })).toThrow("More than one root found: A and B");
  });

  it("fails when a name is both a leaf and a composite", () => {
    expect(() => fromFlattened({ "/A#x": 1, "/A/x#y": 2 })).toThrow(
      "Mixed composite and leaf nodes at same level: /A/x#y"
    );
    expect(() => fromFlattened({ "/A/x#y": 2, "/A#x": 1 })).toThrow(
      "Mixed composite and leaf nodes at same level: /A#x"
    );
  });
});

describe("tagged encoding", () => {
  it("keeps the int/float kind of every leaf", () => {
    const encoded = encodeFlattened(sampleTree());
    expect(encoded["/Build/tests#passed"]).toEqual({ kind: "int", value: 120 });
    expect(encoded["/Build/tests/coverage#branches"]).toEqual({ kind: "float", value: 64 });

    const decoded = decodeFlattened(encoded);
    expect(decoded).toBeInstanceOf(CompositeMetric);
    if (decoded instanceof CompositeMetric) {
      expect(decoded.metric("tests/coverage#branches").kind).toBe("float");
      expect(decoded.metric("tests#passed").kind).toBe("int");
      expect(decoded.equals(sampleTree())).toBe(true);
    }
  });

  it("encodes a bare metric under its own name", () => {
    expect(encodeFlattened(new Metric("uptime", 1.5))).toEqual({ uptime: { kind: "float", value: 1.5 } });
  });

  it("recognises tagged numbers", () => {
    expect(toTagged(3)).toEqual({ kind: "int", value: 3 });
    expect(toTagged(3, "float")).toEqual({ kind: "float", value: 3 });
    expect(isTaggedNumber({ kind: "int", value: 1 })).toBe(true);
    expect(isTaggedNumber({ kind: "double", value: 1 })).toBe(false);
    expect(isTaggedNumber({ kind: "int", value: "1" })).toBe(false);
    expect(isTaggedNumber(7)).toBe(false);
  });
});
