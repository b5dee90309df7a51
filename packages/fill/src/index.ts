/**
 * @mediaref/fill - resolve content identifiers into delivery URLs
 *
 * @example
 * ```typescript
 * import { DirectoryClient } from '@mediaref/directory-sdk';
 * import { DirectoryResolver, Filler, ref, single } from '@mediaref/fill';
 *
 * const filler = new Filler(new DirectoryResolver(new DirectoryClient({ baseUrl })));
 * await filler.fill([single(ref(post, 'coverId'), ref(post, 'coverUrl'))]);
 * ```
 */

// Bindings
export {
  type Binding,
  type BindingKind,
  type IdListSource,
  type IdSource,
  isBinding,
  type MultiBinding,
  multi,
  multiTo,
  type RichBinding,
  rich,
  type SingleBinding,
  single,
  singleTo,
  type TextSource,
} from "./bindings.js";
export { IdentifierCollector } from "./collector.js";
// Configuration
export {
  type DirectoryResolverConfig,
  DirectoryResolverConfigSchema,
  type FillerConfig,
  FillerConfigSchema,
  type ResolvedDirectoryResolverConfig,
  type UnmappedPolicy,
  UnmappedPolicySchema,
} from "./config.js";
// Filler
export { type BindFn, Filler, type FillOptions } from "./filler.js";
export { defaultLogger, isLogger, type Logger, logWarn } from "./logging.js";
// Structural mapper
export { isCopyCompatible, urlSourceKey } from "./mapper/derive.js";
export type {
  CopyAction,
  DynamicMapAction,
  DynamicPlan,
  DynamicSink,
  DynamicSinkKind,
  FieldAction,
  LiftIdAction,
  LiftIdsAction,
  NestedAction,
  RichTextAction,
  TypeShapePlan,
} from "./mapper/plan.js";
export {
  DEFAULT_MAX_DEPTH,
  PlanRegistry,
  type PlanRegistryConfig,
  PlanRegistryConfigSchema,
} from "./mapper/registry.js";
export { cell, type Getter, type Ref, ref, type Setter } from "./ref.js";
// Resolution
export {
  DirectoryResolver,
  type FileUrlSource,
  type ResolveOptions,
  type Resolver,
} from "./resolver.js";
export {
  createResourceInfo,
  lookupResolved,
  projectVariant,
  type ResolvedResources,
  type ResourceInfo,
  type ResourceInfoInit,
  variantUrl,
} from "./resource.js";
// Rich text
export {
  countCaptureGroups,
  createMarker,
  DEFAULT_MARKER,
  DEFAULT_MARKER_PATTERN,
  extractMarkerIds,
  isRichTextMarker,
  type MarkerRenderer,
  replaceSrcAttribute,
  type RichTextMarker,
  rewriteRichText,
} from "./rich-text.js";
export * from "./shape/index.js";
export { RESOLVE_SPAN, withSpan } from "./tracing.js";
