import { describe, expect, it } from "vitest";

import { buildBindingContexts, type ContextPaths } from "../context/bindingContext.js";
import { TemplateRenderError } from "../errors.js";
import { rewriteLegacyTokens } from "./legacyTokens.js";
import { compileTemplate, renderDual, renderForContext } from "./renderer.js";

const stagingPaths: ContextPaths = {
  home: "/tmp/app",
  depsDir: "/tmp/deps",
  tmpDir: "/tmp",
  composerCacheDir: "/tmp/cache/composer",
};

const contexts = buildBindingContexts(
  {
    phpVersion: "7.2.9",
    extensions: { php: new Set(["curl"]), zend: new Set() },
    webdir: "htdocs",
    depsIdx: "0",
  },
  stagingPaths,
);

describe("rewriteLegacyTokens", () => {
  it("maps every legacy marker to its variable", () => {
    expect(rewriteLegacyTokens("@{HOME}/@{DEPS_DIR}/@{TMPDIR} listen = #PHP_FPM_LISTEN")).toBe(
      "{{HOME}}/{{DEPS_DIR}}/{{TMPDIR}} listen = {{PhpFpmListen}}",
    );
  });

  it("rewrites repeated markers", () => {
    expect(rewriteLegacyTokens("@{TMPDIR}:@{TMPDIR}")).toBe("{{TMPDIR}}:{{TMPDIR}}");
  });
});

describe("renderDual", () => {
  it("binds the temp-dir marker to /tmp for staging and the environment for run time", () => {
    const output = renderDual("upload_tmp_dir = @{TMPDIR}\n", "php/etc/php.ini", contexts);
    expect(output).toEqual({
      stage: "upload_tmp_dir = /tmp\n",
      run: "upload_tmp_dir = ${TMPDIR}\n",
    });
  });

  it("inserts extension blocks and paths without escaping", () => {
    const output = renderDual(
      "{{PhpExtensions}}DocumentRoot \"{{HOME}}/{{Webdir}}\"",
      "httpd/conf/httpd.conf",
      contexts,
    );
    expect(output.stage).toBe('extension=curl.so\nDocumentRoot "/tmp/app/htdocs"');
    expect(output.run).toBe('extension=curl.so\nextension=openssl.so\nDocumentRoot "${HOME}/htdocs"');
  });

  it("is repeatable", () => {
    const source = "listen = #PHP_FPM_LISTEN\n{{ZendExtensions}}";
    expect(renderDual(source, "php-fpm.conf", contexts)).toEqual(renderDual(source, "php-fpm.conf", contexts));
  });

  it("reports syntax errors as compile failures", () => {
    expect(() => renderDual("{{#if}", "broken.conf", contexts)).toThrow(TemplateRenderError);
    try {
      renderDual("{{#if}", "broken.conf", contexts);
    } catch (error) {
      expect(error).toBeInstanceOf(TemplateRenderError);
      if (error instanceof TemplateRenderError) {
        expect(error.templatePath).toBe("broken.conf");
        expect(error.contextName).toBe("compile");
      }
    }
  });

  it("fails on variables no context binds", () => {
    expect(() => renderDual("{{NotBound}}", "x.conf", contexts)).toThrow(/rendering x\.conf for stage/);
  });
});

describe("renderForContext", () => {
  it("renders a compiled template for one context", () => {
    const template = compileTemplate("v={{PhpVersion}}", "v.txt");
    expect(renderForContext(template, contexts.run, "v.txt", "run")).toBe("v=7.2.9");
  });
});
