import { InvalidParamsError } from '../protocol/errors.js';
import type { PromptArgument } from '../protocol/types.js';

export interface PromptTemplate {
  name: string;
  description?: string;
  arguments: PromptArgument[];
  /** Text with `{argument_name}` placeholders. */
  template: string;
}

const PLACEHOLDER = /\{([a-zA-Z_][a-zA-Z0-9_]*)\}/g;

/**
 * Substitute `{name}` placeholders. A missing required argument is an
 * InvalidParamsError; any other unfilled placeholder renders as ''.
 */
export function renderTemplate(tpl: PromptTemplate, args: Record<string, string>): string {
  const missing = tpl.arguments
    .filter(a => a.required && args[a.name] === undefined)
    .map(a => a.name);
  if (missing.length > 0) {
    throw new InvalidParamsError(
      `Missing required argument(s) for prompt ${tpl.name}: ${missing.join(', ')}`,
      { missing },
    );
  }

  return tpl.template.replace(PLACEHOLDER, (_match, name: string) => args[name] ?? '');
}

/** Placeholder names in order of first appearance. */
export function templatePlaceholders(template: string): string[] {
  const seen = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    seen.add(match[1]);
  }
  return Array.from(seen);
}
