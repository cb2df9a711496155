import semver from "semver";

export type VersionSource = "options-file" | "dependency-manifest-constraint" | "none";

export interface VersionCandidate {
  source: Exclude<VersionSource, "none">;
  raw: string;
}

/** Raw version declarations in the order they were read. */
export type VersionRequest = readonly VersionCandidate[];

export interface VersionCatalog {
  allVersions(name: string): readonly string[];
  /** Throws when the catalog defines no default for `name`. */
  defaultVersion(name: string): string;
}

export interface ResolvedVersion {
  version: string;
  source: VersionSource;
  /** The range the candidate was matched as, when one was supplied. */
  constraint?: string;
  usedDefault: boolean;
}

export interface VersionResolution {
  resolved: ResolvedVersion;
  warnings: string[];
}

const VERSION_ALIAS_PATTERN = /PHP_(\d)(\d)_LATEST/;

const SOURCE_PRECEDENCE: Record<VersionCandidate["source"], number> = {
  "dependency-manifest-constraint": 2,
  "options-file": 1,
};

/**
 * `PHP_72_LATEST` becomes `7.2.x`, also when wrapped as `{PHP_72_LATEST}`; anything
 * else is returned unchanged.
 */
export function expandVersionAlias(raw: string): string {
  const trimmed = raw.trim();
  const match = VERSION_ALIAS_PATTERN.exec(trimmed);
  if (!match) {
    return trimmed;
  }
  return `${match[1]}.${match[2]}.x`;
}

/**
 * Composer writes "compatible with" as `>=`; the catalog matcher reads it as `~>`,
 * which pins the minor line.
 */
export function toRangeConstraint(raw: string): string {
  return raw.trim().replaceAll(">=", "~>");
}

export function versionLine(version: string): string {
  const parts = version.split(".");
  parts[parts.length - 1] = "x";
  return parts.join(".");
}

export function matchVersion(constraint: string, versions: readonly string[]): string | undefined {
  return semver.maxSatisfying([...versions], constraint) ?? undefined;
}

function pickCandidate(request: VersionRequest): { candidate?: VersionCandidate; warnings: string[] } {
  const present = request.filter((candidate) => candidate.raw.trim().length > 0);
  if (present.length === 0) {
    return { warnings: [] };
  }
  const ranked = [...present].sort(
    (left, right) => SOURCE_PRECEDENCE[right.source] - SOURCE_PRECEDENCE[left.source],
  );
  const candidate = ranked[0];
  const warnings: string[] = [];
  const sources = new Set(present.map((item) => item.source));
  if (sources.has("options-file") && sources.has("dependency-manifest-constraint")) {
    warnings.push(
      "A version of PHP has been specified in both `composer.json` and `./bp-config/options.json`.",
      "The version defined in `composer.json` will be used.",
    );
  }
  return { candidate, warnings };
}

function normalizeCandidate(candidate: VersionCandidate): string {
  if (candidate.source === "options-file") {
    return expandVersionAlias(candidate.raw);
  }
  return toRangeConstraint(candidate.raw);
}

export function resolveVersion(
  request: VersionRequest,
  versions: readonly string[],
  fallback: () => string,
): VersionResolution {
  const { candidate, warnings } = pickCandidate(request);

  if (candidate) {
    const constraint = normalizeCandidate(candidate);
    const matched = matchVersion(constraint, versions);
    if (matched) {
      return {
        resolved: { version: matched, source: candidate.source, constraint, usedDefault: false },
        warnings,
      };
    }
    warnings.push(`PHP version ${constraint} not available, using default version.`);
    return {
      resolved: { version: fallback(), source: candidate.source, constraint, usedDefault: true },
      warnings,
    };
  }

  return {
    resolved: { version: fallback(), source: "none", usedDefault: true },
    warnings,
  };
}

export function resolveFromCatalog(
  request: VersionRequest,
  catalog: VersionCatalog,
  component: string,
): VersionResolution {
  return resolveVersion(request, catalog.allVersions(component), () => catalog.defaultVersion(component));
}
