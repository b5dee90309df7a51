/**
 * Filler: collect identifiers from every binding, resolve them in one
 * batch, then write the results back through each binding.
 */

import { FillAbortedError, MappingUnmappedFieldError, parseConfig } from "@mediaref/errors";
import { type Binding, isBinding } from "./bindings.js";
import { IdentifierCollector } from "./collector.js";
import { type FillerConfig, FillerConfigSchema, type UnmappedPolicy } from "./config.js";
import { defaultLogger, type Logger, logWarn } from "./logging.js";
import { collectValue, fillValue, type MappedRecord } from "./mapper/execute.js";
import type { TypeShapePlan } from "./mapper/plan.js";
import { PlanRegistry } from "./mapper/registry.js";
import type { ResolveOptions, Resolver } from "./resolver.js";
import {
  lookupResolved,
  projectVariant,
  type ResolvedResources,
  type ResourceInfo,
} from "./resource.js";
import {
  DEFAULT_MARKER,
  extractMarkerIds,
  type RichTextMarker,
  rewriteRichText,
} from "./rich-text.js";
import type { InferShape, Shape, ShapeInput } from "./shape/index.js";
import { RESOLVE_SPAN, withSpan } from "./tracing.js";

const LOG_TAG = "mediaref-fill";

export type FillOptions = ResolveOptions;

/** Bindings for one item of a collection */
export type BindFn<T> = (item: T) => readonly (Binding | null | undefined)[];

function isMap<V>(
  value: Readonly<Record<string, V>> | ReadonlyMap<unknown, V>,
): value is ReadonlyMap<unknown, V> {
  return value instanceof Map;
}

function abortCause(signal: AbortSignal): Error | undefined {
  return signal.reason instanceof Error ? signal.reason : undefined;
}

/** Ids a binding contributes to the pass; empties are dropped by the collector */
function bindingIds(binding: Binding): readonly (string | null | undefined)[] {
  switch (binding.kind) {
    case "single":
      return [binding.id.get()];
    case "multi":
      return binding.ids.get() ?? [];
    case "rich": {
      const text = binding.raw.get();
      return text ? extractMarkerIds(text, binding.marker) : [];
    }
  }
}

function resolvedFor(
  resources: ResolvedResources,
  id: string | null | undefined,
  variant: string | undefined,
): ResourceInfo | undefined {
  const info = id ? lookupResolved(resources, id) : undefined;
  return info && projectVariant(info, variant);
}

function applyBinding(binding: Binding, resources: ResolvedResources): void {
  switch (binding.kind) {
    case "single": {
      const info = resolvedFor(resources, binding.id.get(), binding.variant);
      if (info) {
        binding.assign(info);
      }
      return;
    }
    case "multi": {
      const ids = binding.ids.get();
      if (ids && ids.length > 0) {
        binding.assign(ids.map((id) => resolvedFor(resources, id, binding.variant)));
      }
      return;
    }
    case "rich": {
      const text = binding.raw.get();
      if (text) {
        binding.rendered.set(
          rewriteRichText(
            text,
            (id) => resolvedFor(resources, id, binding.variant)?.url,
            binding.marker,
          ),
        );
      }
      return;
    }
  }
}

/**
 * Orchestrates resolution passes over bindings and mapped shapes.
 *
 * @example
 * ```typescript
 * const filler = new Filler(new DirectoryResolver(client));
 * await filler.fill([
 *   single(ref(post, "coverId"), ref(post, "coverUrl")),
 *   multi(ref(post, "galleryIds"), ref(post, "galleryUrls")).useVariant("thumbnail"),
 *   rich(ref(post, "body"), ref(post, "body")),
 * ]);
 * ```
 */
export class Filler {
  readonly registry: PlanRegistry;
  private readonly resolver: Resolver;
  private readonly unmapped: UnmappedPolicy;
  private readonly tracing: boolean;
  private readonly logger: Logger;
  private readonly marker: RichTextMarker;
  private readonly reportedPlans = new WeakSet<TypeShapePlan>();

  constructor(resolver: Resolver, config: FillerConfig = {}) {
    const parsed = parseConfig("filler", FillerConfigSchema, config);
    this.resolver = resolver;
    this.registry =
      parsed.registry ??
      new PlanRegistry(parsed.maxDepth !== undefined ? { maxDepth: parsed.maxDepth } : {});
    this.unmapped = parsed.unmapped;
    this.tracing = parsed.tracing;
    this.logger = parsed.logger ?? defaultLogger;
    this.marker = parsed.marker ?? DEFAULT_MARKER;
  }

  /**
   * Fill every binding from a single resolve call.
   *
   * Null entries are skipped. Unresolved or failed identifiers leave their
   * destination untouched. A rejected resolve fills nothing and its error
   * propagates unchanged.
   *
   * @throws FillAbortedError when `options.signal` aborts before the resolve completes
   */
  async fill(
    bindings: readonly (Binding | null | undefined)[],
    options: FillOptions = {},
  ): Promise<void> {
    const active = bindings.filter(isBinding);
    const collector = new IdentifierCollector();
    for (const binding of active) {
      collector.addAll(bindingIds(binding));
    }
    if (collector.size === 0) {
      return;
    }

    const resources = await this.resolve(collector, options.signal);
    for (const binding of active) {
      applyBinding(binding, resources);
    }
  }

  /**
   * Fill the bindings of one item; null or undefined items are a no-op.
   */
  async fillOne<T>(
    item: T | null | undefined,
    bind: BindFn<T>,
    options: FillOptions = {},
  ): Promise<void> {
    if (item === null || item === undefined) {
      return;
    }
    await this.fill(bind(item), options);
  }

  /**
   * Fill the bindings of every item in one pass.
   */
  async fillMany<T>(
    items: readonly (T | null | undefined)[],
    bind: BindFn<T>,
    options: FillOptions = {},
  ): Promise<void> {
    const bindings: (Binding | null | undefined)[] = [];
    for (const item of items) {
      if (item !== null && item !== undefined) {
        bindings.push(...bind(item));
      }
    }
    await this.fill(bindings, options);
  }

  /**
   * Fill the bindings of every value of a keyed collection in one pass.
   */
  async fillEntries<T>(
    entries: Readonly<Record<string, T | null | undefined>> | ReadonlyMap<unknown, T | null | undefined>,
    bind: BindFn<T>,
    options: FillOptions = {},
  ): Promise<void> {
    const values = isMap(entries) ? [...entries.values()] : Object.values(entries);
    await this.fillMany(values, bind, options);
  }

  /**
   * Map source values onto a destination shape and resolve every url,
   * urls and richText field in one pass.
   *
   * Null or non-object sources map to null.
   */
  async autoFill<S extends Shape, D extends Shape>(
    source: S,
    destination: D,
    sources: readonly (ShapeInput<S> | null | undefined)[],
    options: FillOptions = {},
  ): Promise<(InferShape<D> | null)[]> {
    const plan = this.registry.planFor(source, destination);
    this.reportUnmapped(plan);
    if (sources.length === 0) {
      return [];
    }

    const collector = new IdentifierCollector();
    const results = sources.map((item) =>
      collectValue(item, plan, { collector, marker: this.marker }),
    );

    if (collector.size > 0) {
      const resources = await this.resolve(collector, options.signal);
      for (const result of results) {
        fillValue(result, plan, { resources, marker: this.marker });
      }
    }
    return results.map((result) => (result === null ? null : asShapeValue<D>(result)));
  }

  /**
   * Single-value form of autoFill; a null source yields undefined.
   */
  async autoFillOne<S extends Shape, D extends Shape>(
    source: S,
    destination: D,
    value: ShapeInput<S> | null | undefined,
    options: FillOptions = {},
  ): Promise<InferShape<D> | undefined> {
    if (value === null || value === undefined) {
      return undefined;
    }
    const [result] = await this.autoFill(source, destination, [value], options);
    return result ?? undefined;
  }

  private reportUnmapped(plan: TypeShapePlan): void {
    if (plan.unmapped.length === 0 || this.unmapped === "ignore") {
      return;
    }
    if (this.unmapped === "error") {
      throw new MappingUnmappedFieldError(plan.source.name, plan.destination.name, plan.unmapped);
    }
    if (!this.reportedPlans.has(plan)) {
      this.reportedPlans.add(plan);
      logWarn(
        this.logger,
        LOG_TAG,
        `${plan.source.name} -> ${plan.destination.name}: unmapped destination field(s) ${plan.unmapped.join(", ")}`,
      );
    }
  }

  private async resolve(
    collector: IdentifierCollector,
    signal: AbortSignal | undefined,
  ): Promise<ResolvedResources> {
    const ids = collector.toArray();
    if (signal?.aborted) {
      throw new FillAbortedError(ids.length, abortCause(signal));
    }

    const call = () => this.resolver.resolve(ids, { signal });
    let resources: ResolvedResources;
    try {
      resources = this.tracing
        ? await withSpan(RESOLVE_SPAN, { "mediaref.id_count": ids.length }, call)
        : await call();
    } catch (error) {
      if (signal?.aborted) {
        throw new FillAbortedError(
          ids.length,
          error instanceof Error ? error : abortCause(signal),
        );
      }
      throw error;
    }

    if (signal?.aborted) {
      throw new FillAbortedError(ids.length, abortCause(signal));
    }

    this.reportFailures(ids, resources);
    return resources;
  }

  private reportFailures(ids: readonly string[], resources: ResolvedResources): void {
    const failures: string[] = [];
    for (const id of ids) {
      const info = resources.get(id);
      if (info && !info.success) {
        failures.push(info.error ? `${id} (${info.error})` : id);
      }
    }
    if (failures.length > 0) {
      logWarn(
        this.logger,
        LOG_TAG,
        `${failures.length} of ${ids.length} identifier(s) failed to resolve: ${failures.join(", ")}`,
      );
    }
  }
}

/**
 * Values built by the mapper carry exactly the destination shape's fields.
 */
function asShapeValue<D extends Shape>(value: MappedRecord): InferShape<D> {
  return value as InferShape<D>;
}
