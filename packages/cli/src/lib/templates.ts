/**
 * Index template loading and prefix substitution
 */

import { fileURLToPath } from "node:url";
import { normalizeIndexPrefix } from "@spanstore/writer";
import { parseJson } from "./arg.js";
import { readTextFile } from "./io.js";

export type TemplateKind = "span" | "service";

const PREFIX_PLACEHOLDER = "{{indexPrefix}}";

/**
 * Path of a template shipped with the CLI
 */
export function bundledTemplatePath(kind: TemplateKind): string {
  return fileURLToPath(new URL(`../../templates/${kind}-template.json`, import.meta.url));
}

/**
 * Substitute the index prefix and check the result is JSON
 */
export function renderTemplate(body: string, indexPrefix: string, source: string): string {
  const rendered = body.replaceAll(PREFIX_PLACEHOLDER, normalizeIndexPrefix(indexPrefix));
  parseJson(rendered, source);
  return rendered;
}

/**
 * Load a template from a file, or the bundled one, with the prefix applied
 */
export async function loadTemplate(kind: TemplateKind, indexPrefix: string, file?: string): Promise<string> {
  const source = file ?? bundledTemplatePath(kind);
  const body = await readTextFile(source, `${kind} template`);
  return renderTemplate(body, indexPrefix, source);
}
