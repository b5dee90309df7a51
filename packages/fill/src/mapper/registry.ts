/**
 * Plan registry: derives and caches one plan per (source, destination)
 * shape pair, keyed by shape identity.
 *
 * Derivation is synchronous, so concurrent fills never observe a
 * half-built entry. Entries are never evicted.
 */

import { MappingCycleError, MappingDepthExceededError, parseConfig } from "@mediaref/errors";
import { z } from "zod";
import type { Shape } from "../shape/index.js";
import { deriveDynamicPlan, derivePlan } from "./derive.js";
import type { DynamicPlan, TypeShapePlan } from "./plan.js";

export const DEFAULT_MAX_DEPTH = 32;

export const PlanRegistryConfigSchema = z.object({
  /** Deepest shape nesting a plan may have */
  maxDepth: z.number().int().min(1).default(DEFAULT_MAX_DEPTH),
});

export type PlanRegistryConfig = z.input<typeof PlanRegistryConfigSchema>;

interface PlanFrame {
  readonly source: Shape;
  readonly destination: Shape;
}

function label(frame: PlanFrame): string {
  return `${frame.source.name}->${frame.destination.name}`;
}

export class PlanRegistry {
  readonly maxDepth: number;
  private readonly plans = new Map<Shape, Map<Shape, TypeShapePlan>>();
  private readonly dynamicPlans = new Map<Shape, DynamicPlan>();

  constructor(config: PlanRegistryConfig = {}) {
    this.maxDepth = parseConfig("plan registry", PlanRegistryConfigSchema, config).maxDepth;
  }

  /**
   * Cached plan for the pair, derived on first use.
   *
   * @throws MappingCycleError when a pair is reached again while its own plan is being derived
   * @throws MappingDepthExceededError when nesting exceeds maxDepth
   */
  planFor(source: Shape, destination: Shape): TypeShapePlan {
    return this.resolve({ source, destination }, []);
  }

  /**
   * Cached plan populating `destination` from schema-less payloads
   */
  dynamicPlanFor(destination: Shape): DynamicPlan {
    let plan = this.dynamicPlans.get(destination);
    if (!plan) {
      plan = deriveDynamicPlan(destination);
      this.dynamicPlans.set(destination, plan);
    }
    return plan;
  }

  has(source: Shape, destination: Shape): boolean {
    return this.plans.get(source)?.has(destination) ?? false;
  }

  /** Number of cached shape-pair plans */
  get size(): number {
    let count = 0;
    for (const byDestination of this.plans.values()) {
      count += byDestination.size;
    }
    return count;
  }

  private resolve(frame: PlanFrame, trail: readonly PlanFrame[]): TypeShapePlan {
    const cached = this.plans.get(frame.source)?.get(frame.destination);
    if (cached) {
      return cached;
    }

    const path = [...trail, frame];
    if (trail.some((f) => f.source === frame.source && f.destination === frame.destination)) {
      throw new MappingCycleError(path.map(label));
    }
    if (path.length > this.maxDepth) {
      throw new MappingDepthExceededError(this.maxDepth, path.map(label));
    }

    const plan = derivePlan(
      frame.source,
      frame.destination,
      (source, destination) => this.resolve({ source, destination }, path),
      (destination) => this.dynamicPlanFor(destination),
    );

    let byDestination = this.plans.get(frame.source);
    if (!byDestination) {
      byDestination = new Map();
      this.plans.set(frame.source, byDestination);
    }
    byDestination.set(frame.destination, plan);
    return plan;
  }
}
