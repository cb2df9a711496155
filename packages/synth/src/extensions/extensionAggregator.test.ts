import { describe, expect, it } from "vitest";

import {
  DEFAULT_PHP_EXTENSIONS,
  aggregateExtensions,
  extensionsFromRequireKeys,
  foldExtensionSources,
  sortedExtensionNames,
  type ExtensionSource,
} from "./extensionAggregator.js";

describe("extensionsFromRequireKeys", () => {
  it("takes names from ext- keys and implies pdo for pdo drivers", () => {
    expect(extensionsFromRequireKeys(["php", "ext-curl", "ext-pdo_mysql", "monolog/monolog"]).sort()).toEqual([
      "curl",
      "pdo",
      "pdo_mysql",
    ]);
  });
});

describe("aggregateExtensions", () => {
  it("starts from the built-in defaults", () => {
    const { extensions, warnings } = aggregateExtensions(DEFAULT_PHP_EXTENSIONS, {}, []);
    expect(sortedExtensionNames(extensions.php)).toEqual(["bz2", "curl", "mcrypt", "zlib"]);
    expect(extensions.zend.size).toBe(0);
    expect(warnings).toEqual([]);
  });

  it("replaces the defaults with a legacy options list and warns", () => {
    const { extensions, warnings } = aggregateExtensions(DEFAULT_PHP_EXTENSIONS, { php: ["gd", "gd"] }, []);
    expect(sortedExtensionNames(extensions.php)).toEqual(["gd"]);
    expect(warnings).toEqual(["PHP_EXTENSIONS in options.json is deprecated."]);
  });

  it("keeps zend extensions in their own set", () => {
    const { extensions } = aggregateExtensions(DEFAULT_PHP_EXTENSIONS, { zend: ["opcache"] }, ["ext-opcache"]);
    expect(sortedExtensionNames(extensions.zend)).toEqual(["opcache"]);
    expect(extensions.php.has("opcache")).toBe(true);
  });

  it("adds composer requirements on top of replaced defaults", () => {
    const { extensions } = aggregateExtensions(
      DEFAULT_PHP_EXTENSIONS,
      { php: ["gd"] },
      ["ext-curl", "ext-pdo_mysql"],
    );
    expect(sortedExtensionNames(extensions.php)).toEqual(["curl", "gd", "pdo", "pdo_mysql"]);
  });

  it("includes curl, pdo_mysql and pdo for composer extension keys", () => {
    const { extensions } = aggregateExtensions(DEFAULT_PHP_EXTENSIONS, {}, ["ext-curl", "ext-pdo_mysql"]);
    expect(extensions.php.has("curl")).toBe(true);
    expect(extensions.php.has("pdo_mysql")).toBe(true);
    expect(extensions.php.has("pdo")).toBe(true);
  });
});

describe("foldExtensionSources", () => {
  const sources: ExtensionSource[] = [
    { tier: "defaults", php: DEFAULT_PHP_EXTENSIONS },
    { tier: "options-file", php: ["gd", "mbstring"], zend: ["xdebug"] },
    { tier: "dependency-manifest", requireKeys: ["ext-intl", "ext-pdo_pgsql"] },
  ];

  it("gives the same set whatever order the sources arrive in", () => {
    const expected = foldExtensionSources(sources);
    const orders = [
      [2, 1, 0],
      [1, 2, 0],
      [0, 2, 1],
    ];
    for (const order of orders) {
      const { extensions } = foldExtensionSources(order.map((index) => sources[index]));
      expect(sortedExtensionNames(extensions.php)).toEqual(sortedExtensionNames(expected.extensions.php));
      expect(sortedExtensionNames(extensions.zend)).toEqual(["xdebug"]);
    }
    expect(sortedExtensionNames(expected.extensions.php)).toEqual(["gd", "intl", "mbstring", "pdo", "pdo_pgsql"]);
  });

  it("yields empty sets without sources", () => {
    const { extensions } = foldExtensionSources([]);
    expect(extensions.php.size).toBe(0);
    expect(extensions.zend.size).toBe(0);
  });
});
