import Handlebars from "handlebars";

import type { BindingContext, BindingContexts, ContextName } from "../context/bindingContext.js";
import { TemplateRenderError, toError } from "../errors.js";
import { rewriteLegacyTokens } from "./legacyTokens.js";

export type CompiledTemplate = (context: BindingContext) => string;

export interface DualRendering {
  stage: string;
  run: string;
}

/**
 * Rewrites legacy tokens and compiles the result. Syntax errors surface here,
 * not at render time.
 */
export function compileTemplate(source: string, templatePath: string): CompiledTemplate {
  let program: ReturnType<typeof Handlebars.parse>;
  try {
    program = Handlebars.parse(rewriteLegacyTokens(source));
  } catch (error) {
    throw new TemplateRenderError(templatePath, "compile", toError(error));
  }
  const delegate = Handlebars.compile<BindingContext>(program, { noEscape: true, strict: true });
  return (context) => delegate(context);
}

export function renderForContext(
  template: CompiledTemplate,
  context: BindingContext,
  templatePath: string,
  contextName: ContextName,
): string {
  try {
    return template(context);
  } catch (error) {
    throw new TemplateRenderError(templatePath, contextName, toError(error));
  }
}

/** Compiles once and renders for both contexts; either failure fails the file. */
export function renderDual(source: string, templatePath: string, contexts: BindingContexts): DualRendering {
  const template = compileTemplate(source, templatePath);
  return {
    stage: renderForContext(template, contexts.stage, templatePath, "stage"),
    run: renderForContext(template, contexts.run, templatePath, "run"),
  };
}
