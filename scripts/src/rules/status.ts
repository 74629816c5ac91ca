import type { CompositeMetric } from "../metrics/composite.js";

export const StatusLevel = {
  IMPROVEMENT: "improvement",
  ALERT: "alert",
  FAILURE: "failure"
} as const;

export type StatusLevel = (typeof StatusLevel)[keyof typeof StatusLevel];

export class ValidationStatus {
  constructor(
    public readonly level: StatusLevel,
    public readonly text: string,
    public readonly parentMetric: CompositeMetric,
    public readonly offendingElements: readonly string[]
  ) {}

  /**
   * Map each offending key path to the composite that was checked. Resolve the
   * actual leaf with `parentMetric.metric(key)`.
   */
  offendingMetrics(): Map<string, CompositeMetric> {
    return new Map(this.offendingElements.map((key) => [key, this.parentMetric]));
  }
}
