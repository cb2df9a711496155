import YAML from "yaml";

export const START_SCRIPT_NAME = "php_buildpack_start";
export const PROFILE_SCRIPT_NAME = "bp_env_vars.sh";
export const VERIFIER_NAME = "varify";

function depRoot(depsIdx: string): string {
  return `$DEPS_DIR/${depsIdx}`;
}

/** Points apachectl at the dep dir instead of the archive's `/app/httpd` build prefix. */
export function rewriteApachectl(script: string, depsIdx: string): string {
  return script
    .replaceAll("HTTPD='/app/httpd/bin/httpd'", 'HTTPD="/app/httpd/bin/httpd"')
    .replaceAll("/app/httpd/", `${depRoot(depsIdx)}/httpd/`);
}

export function verifierCommand(depsIdx: string): string {
  const root = depRoot(depsIdx);
  return `${VERIFIER_NAME} "${root}/php/etc/" "${root}/httpd/conf/"`;
}

export function renderProfileScript(depsIdx: string, options: { iniScanDir: boolean }): string {
  const root = depRoot(depsIdx);
  const lines = [`export PHPRC=${root}/php/etc`, "export HTTPD_SERVER_ADMIN=admin@localhost"];
  if (options.iniScanDir) {
    lines.push(`export PHP_INI_SCAN_DIR=${root}/php/etc/php.ini.d`);
  }
  lines.push(verifierCommand(depsIdx));
  return `${lines.join("\n")}\n`;
}

export function renderStartScript(depsIdx: string, options: { verify: boolean }): string {
  const root = depRoot(depsIdx);
  const lines = ["#!/usr/bin/env bash"];
  if (options.verify) {
    lines.push(verifierCommand(depsIdx));
  }
  lines.push(
    `${root}/php/sbin/php-fpm -p "${root}/php/etc" -y "${root}/php/etc/php-fpm.conf" -c "${root}/php/etc" &`,
    `${root}/httpd/bin/apachectl -f "${root}/httpd/conf/httpd.conf" -k start -DFOREGROUND`,
  );
  return `${lines.join("\n")}\n`;
}

export interface ReleaseDescriptor {
  default_process_types: Record<string, string>;
}

export function buildReleaseDescriptor(depsIdx: string): ReleaseDescriptor {
  return { default_process_types: { web: `${depRoot(depsIdx)}/bin/${START_SCRIPT_NAME}` } };
}

export function renderReleaseDescriptor(depsIdx: string): string {
  return YAML.stringify(buildReleaseDescriptor(depsIdx));
}
