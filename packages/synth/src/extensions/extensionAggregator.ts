export const DEFAULT_PHP_EXTENSIONS: readonly string[] = ["bz2", "zlib", "curl", "mcrypt"];

const EXTENSION_KEY_PREFIX = "ext-";
const PDO_DRIVER_PREFIX = "ext-pdo_";

export interface ExtensionSet {
  /** Loaded with `extension=<name>.so`. */
  php: ReadonlySet<string>;
  /** Loaded with `zend_extension=<name>`. */
  zend: ReadonlySet<string>;
}

export type ExtensionSource =
  | { tier: "defaults"; php: readonly string[] }
  | { tier: "options-file"; php?: readonly string[]; zend?: readonly string[] }
  | { tier: "dependency-manifest"; requireKeys: readonly string[] };

export interface ExtensionAggregation {
  extensions: ExtensionSet;
  warnings: string[];
}

const TIER_ORDER: Record<ExtensionSource["tier"], number> = {
  defaults: 0,
  "options-file": 1,
  "dependency-manifest": 2,
};

export const EMPTY_EXTENSION_SET: ExtensionSet = { php: new Set(), zend: new Set() };

export function extensionsFromRequireKeys(requireKeys: readonly string[]): string[] {
  const names = new Set<string>();
  for (const key of requireKeys) {
    if (key.startsWith(EXTENSION_KEY_PREFIX)) {
      names.add(key.slice(EXTENSION_KEY_PREFIX.length));
    }
    if (key.startsWith(PDO_DRIVER_PREFIX)) {
      names.add("pdo");
    }
  }
  return [...names];
}

function union(base: ReadonlySet<string>, extra: readonly string[]): Set<string> {
  const merged = new Set(base);
  for (const name of extra) {
    merged.add(name);
  }
  return merged;
}

function applySource(current: ExtensionAggregation, source: ExtensionSource): ExtensionAggregation {
  switch (source.tier) {
    case "defaults":
      return {
        extensions: { ...current.extensions, php: new Set(source.php) },
        warnings: current.warnings,
      };
    case "options-file": {
      const warnings = [...current.warnings];
      let { php, zend } = current.extensions;
      if (source.php) {
        warnings.push("PHP_EXTENSIONS in options.json is deprecated.");
        php = new Set(source.php);
      }
      if (source.zend) {
        zend = new Set(source.zend);
      }
      return { extensions: { php, zend }, warnings };
    }
    case "dependency-manifest":
      return {
        extensions: {
          ...current.extensions,
          php: union(current.extensions.php, extensionsFromRequireKeys(source.requireKeys)),
        },
        warnings: current.warnings,
      };
  }
}

/**
 * Folds the extension sources into one set. Sources are applied by tier, not by
 * argument order: defaults, then the options file (which replaces), then
 * composer requirements (which add).
 */
export function foldExtensionSources(sources: readonly ExtensionSource[]): ExtensionAggregation {
  const ordered = [...sources].sort((left, right) => TIER_ORDER[left.tier] - TIER_ORDER[right.tier]);
  return ordered.reduce<ExtensionAggregation>(applySource, {
    extensions: EMPTY_EXTENSION_SET,
    warnings: [],
  });
}

export function aggregateExtensions(
  defaults: readonly string[],
  options: { php?: readonly string[]; zend?: readonly string[] },
  requireKeys: readonly string[],
): ExtensionAggregation {
  return foldExtensionSources([
    { tier: "defaults", php: defaults },
    { tier: "options-file", php: options.php, zend: options.zend },
    { tier: "dependency-manifest", requireKeys },
  ]);
}

export function sortedExtensionNames(names: ReadonlySet<string>): string[] {
  return [...names].sort();
}
