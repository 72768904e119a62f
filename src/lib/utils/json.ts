/**
 * Lenient JSON extraction for model output
 */
import { z } from 'zod';
import { errorMessage, MalformedProviderOutputError } from '../errors';
import { debug } from './debug';

/**
 * Pull a JSON value out of model text. Handles markdown code fences and
 * objects embedded in surrounding prose.
 *
 * @returns The parsed value, or undefined when nothing parses
 */
export function extractJson(text: string): unknown {
  let t = text.trim();

  const fenced = t.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (fenced) {
    debug('llm', 'Stripping markdown code fence from model output');
    t = fenced[1].trim();
  }

  if ((t.startsWith('{') && t.endsWith('}')) || (t.startsWith('[') && t.endsWith(']'))) {
    try {
      return JSON.parse(t);
    } catch (error) {
      debug('llm', 'Direct JSON parse failed: %s', errorMessage(error));
    }
  }

  const m = t.match(/\{[\s\S]*\}/);
  if (m) {
    try {
      return JSON.parse(m[0]);
    } catch {
      debug('llm', 'Failed to parse embedded JSON object');
    }
  }

  return undefined;
}

/**
 * Free-text field of a model reply. Never fails validation: missing or null
 * becomes '', other non-strings are serialised.
 */
export const LenientText = z
  .unknown()
  .transform((value): string => (typeof value === 'string' ? value : value == null ? '' : JSON.stringify(value)));

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: MalformedProviderOutputError };

/**
 * Extract JSON from text and validate it against a schema
 */
export function parseStructured<S extends z.ZodTypeAny>(text: string, schema: S): ParseResult<z.output<S>> {
  const raw = extractJson(text);
  if (raw === undefined) {
    return { ok: false, error: new MalformedProviderOutputError('No JSON found in model output', text) };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: new MalformedProviderOutputError(`Model output has the wrong shape: ${details}`, text) };
  }
  return { ok: true, value: result.data };
}
