import YAML from "yaml";
import { describe, expect, it } from "vitest";

import {
  buildReleaseDescriptor,
  renderProfileScript,
  renderReleaseDescriptor,
  renderStartScript,
  rewriteApachectl,
} from "./startScripts.js";

describe("rewriteApachectl", () => {
  it("relocates the httpd prefix into the dep dir", () => {
    const original = [
      "HTTPD='/app/httpd/bin/httpd'",
      'ENVVARS="/app/httpd/bin/envvars"',
      "",
    ].join("\n");
    expect(rewriteApachectl(original, "2")).toBe(
      ['HTTPD="$DEPS_DIR/2/httpd/bin/httpd"', 'ENVVARS="$DEPS_DIR/2/httpd/bin/envvars"', ""].join("\n"),
    );
  });
});

describe("renderProfileScript", () => {
  it("exports PHPRC and runs the verifier", () => {
    expect(renderProfileScript("0", { iniScanDir: false })).toBe(
      [
        "export PHPRC=$DEPS_DIR/0/php/etc",
        "export HTTPD_SERVER_ADMIN=admin@localhost",
        'varify "$DEPS_DIR/0/php/etc/" "$DEPS_DIR/0/httpd/conf/"',
        "",
      ].join("\n"),
    );
  });

  it("adds the ini scan dir when one was rendered", () => {
    expect(renderProfileScript("1", { iniScanDir: true })).toContain(
      "export PHP_INI_SCAN_DIR=$DEPS_DIR/1/php/etc/php.ini.d\n",
    );
  });
});

describe("renderStartScript", () => {
  it("starts php-fpm in the background and httpd in the foreground", () => {
    expect(renderStartScript("0", { verify: false })).toBe(
      [
        "#!/usr/bin/env bash",
        '$DEPS_DIR/0/php/sbin/php-fpm -p "$DEPS_DIR/0/php/etc" -y "$DEPS_DIR/0/php/etc/php-fpm.conf" -c "$DEPS_DIR/0/php/etc" &',
        '$DEPS_DIR/0/httpd/bin/apachectl -f "$DEPS_DIR/0/httpd/conf/httpd.conf" -k start -DFOREGROUND',
        "",
      ].join("\n"),
    );
  });

  it("runs the verifier first when asked", () => {
    const lines = renderStartScript("3", { verify: true }).split("\n");
    expect(lines[1]).toBe('varify "$DEPS_DIR/3/php/etc/" "$DEPS_DIR/3/httpd/conf/"');
  });
});

describe("release descriptor", () => {
  it("maps the web process to the start script", () => {
    expect(buildReleaseDescriptor("5")).toEqual({
      default_process_types: { web: "$DEPS_DIR/5/bin/php_buildpack_start" },
    });
    expect(YAML.parse(renderReleaseDescriptor("5"))).toEqual(buildReleaseDescriptor("5"));
  });
});
