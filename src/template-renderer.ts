// src/template-renderer.ts — Built-in templates keyed by output file name

import { UnrecognizedSelectionError, type TemplateContext, type TemplateRenderer } from "./types.js";
import { renderApplicationJava } from "./templates/application-java.js";
import { renderApplicationYaml } from "./templates/application-yaml.js";
import { renderPomXml } from "./templates/pom-xml.js";

type TemplateFn = (context: TemplateContext) => string;

const TEMPLATES: Readonly<Record<string, TemplateFn>> = {
  "Application.java": renderApplicationJava,
  "application.yaml": renderApplicationYaml,
  "pom.xml": renderPomXml,
};

export function listTemplates(): string[] {
  return Object.keys(TEMPLATES);
}

export function hasTemplate(templateId: string): boolean {
  return Object.prototype.hasOwnProperty.call(TEMPLATES, templateId);
}

/**
 * Renderer over the built-in templates. Template errors propagate as thrown.
 */
export function createBuiltinRenderer(): TemplateRenderer {
  return {
    render(context: TemplateContext, templateId: string): string {
      if (!hasTemplate(templateId)) {
        throw new UnrecognizedSelectionError("file", templateId);
      }
      return TEMPLATES[templateId](context);
    },
  };
}
