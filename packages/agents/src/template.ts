import Mustache from 'mustache';
import type { RenderOptions } from 'mustache';
import { TemplateError } from '@switchboard/shared';

/** Prompts are plain text, so values are inserted verbatim instead of HTML-escaped. */
const RENDER_OPTIONS: RenderOptions = { escape: (value) => String(value) };

/**
 * Render a logic-less `{{name}}` template against `data`.
 * Parse and render failures become TemplateError.
 */
export function renderTemplate(template: string, data: Record<string, unknown>): string {
  try {
    Mustache.parse(template);
    return Mustache.render(template, data, undefined, RENDER_OPTIONS);
  } catch (err) {
    throw new TemplateError(
      `failed to render template: ${err instanceof Error ? err.message : String(err)}`,
      { operation: 'renderTemplate' },
      { cause: err },
    );
  }
}
