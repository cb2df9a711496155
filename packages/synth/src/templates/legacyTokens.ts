/** Placeholder spellings older templates use, mapped to their binding variable. */
export const LEGACY_TOKENS: ReadonlyArray<readonly [token: string, variable: string]> = [
  ["@{DEPS_DIR}", "DEPS_DIR"],
  ["@{TMPDIR}", "TMPDIR"],
  ["@{HOME}", "HOME"],
  ["#PHP_FPM_LISTEN", "PhpFpmListen"],
];

export function rewriteLegacyTokens(text: string): string {
  return LEGACY_TOKENS.reduce(
    (rewritten, [token, variable]) => rewritten.replaceAll(token, `{{${variable}}}`),
    text,
  );
}
