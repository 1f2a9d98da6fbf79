/**
 * Parsing of raw model text into checked agent output.
 *
 * @packageDocumentation
 */

import type { SchemaCheck } from '../utils/schema.js';
import type { AgentOutcome } from './types.js';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extracts a JSON object from model text.
 *
 * Accepts bare JSON, a fenced ```json block, or prose surrounding a single
 * top-level object.
 *
 * @returns The parsed value, or undefined when no JSON object is found.
 */
export function extractJson(text: string): unknown {
  const trimmed = text.trim();

  const direct = tryParse(trimmed);
  if (direct !== undefined) {
    return direct;
  }

  const fenced = FENCED_BLOCK.exec(trimmed);
  if (fenced?.[1] !== undefined) {
    const parsed = tryParse(fenced[1].trim());
    if (parsed !== undefined) {
      return parsed;
    }
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return tryParse(trimmed.slice(start, end + 1));
  }
  return undefined;
}

/**
 * Parses model text and checks it against a schema.
 *
 * @param text - Raw model output.
 * @param check - Schema check for the expected shape.
 * @param label - Names the output in failure reasons.
 */
export function parseModelOutput<T>(
  text: string,
  check: (data: unknown) => SchemaCheck<T>,
  label: string
): AgentOutcome<T> {
  const data = extractJson(text);
  if (data === undefined) {
    return { kind: 'malformed', reason: `${label}: response is not JSON` };
  }
  const result = check(data);
  if (!result.valid) {
    return { kind: 'malformed', reason: `${label}: ${result.errors.join('; ')}` };
  }
  return { kind: 'ok', output: result.value };
}
