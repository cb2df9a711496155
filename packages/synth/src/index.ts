/**
 * Configuration synthesis for PHP staging.
 *
 * Resolves the PHP version and extension set from the app's declarative sources,
 * binds them into a staging context and a run-time context, and renders one
 * template tree into two output trees that differ only in the bound values.
 *
 * @example
 * ```typescript
 * import { buildBindingContexts, loadTemplateTree, renderTemplateTree } from '@phpstage/synth';
 *
 * const contexts = buildBindingContexts(inputs, stagingPaths);
 * const tree = await loadTemplateTree(layers);
 * await renderTemplateTree(tree, contexts, { stage: '/tmp/php_etc', run: depDir });
 * ```
 */

// Version resolution
export {
  expandVersionAlias,
  matchVersion,
  resolveFromCatalog,
  resolveVersion,
  toRangeConstraint,
  versionLine,
} from "./version/versionResolver.js";
export type {
  ResolvedVersion,
  VersionCandidate,
  VersionCatalog,
  VersionRequest,
  VersionResolution,
  VersionSource,
} from "./version/versionResolver.js";

// Extensions
export {
  DEFAULT_PHP_EXTENSIONS,
  EMPTY_EXTENSION_SET,
  aggregateExtensions,
  extensionsFromRequireKeys,
  foldExtensionSources,
  sortedExtensionNames,
} from "./extensions/extensionAggregator.js";
export type { ExtensionAggregation, ExtensionSet, ExtensionSource } from "./extensions/extensionAggregator.js";

// Binding contexts
export {
  BINDING_KEYS,
  DEFAULT_LIBDIR,
  DEFAULT_PHP_FPM_LISTEN,
  RUNTIME_REQUIRED_EXTENSION,
  VARYING_BINDING_KEYS,
  buildBindingContexts,
  diffBindingContexts,
  runtimeContextPaths,
  serializePhpExtensions,
  serializeZendExtensions,
} from "./context/bindingContext.js";
export type {
  BindingContext,
  BindingContexts,
  BindingInputs,
  BindingKey,
  ContextName,
  ContextPaths,
} from "./context/bindingContext.js";

// Templates
export { LEGACY_TOKENS, rewriteLegacyTokens } from "./templates/legacyTokens.js";
export { compileTemplate, renderDual, renderForContext } from "./templates/renderer.js";
export type { CompiledTemplate, DualRendering } from "./templates/renderer.js";
export { loadTemplateTree, renderTemplateTree } from "./templates/templateTree.js";
export type {
  RenderDestinations,
  RenderedFile,
  TemplateEntry,
  TemplateLayer,
  TemplateTree,
} from "./templates/templateTree.js";

// Errors
export { TemplateRenderError, toError } from "./errors.js";
