import type { z } from 'zod';
import type { StructuredOutput } from '../types.js';

// The whole reply may be wrapped in one markdown code fence, nothing else around it
const FENCED = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/;

/**
 * Parse model output as JSON matching `schema`. The output must be the JSON
 * document itself (optionally fenced); JSON embedded in prose is rejected.
 */
export function parseStructuredOutput<S extends z.ZodTypeAny>(
  raw: string,
  schema: S
): StructuredOutput<z.output<S>> {
  const trimmed = raw.trim();
  const fenced = FENCED.exec(trimmed);
  const candidate = fenced?.[1] ?? trimmed;

  let json: unknown;
  try {
    json = JSON.parse(candidate);
  } catch (error) {
    return {
      kind: 'unparseable',
      raw,
      reason: error instanceof Error ? error.message : 'Invalid JSON',
    };
  }

  const validated = schema.safeParse(json);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    return {
      kind: 'unparseable',
      raw,
      reason: issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'Schema mismatch',
    };
  }

  return { kind: 'parsed', value: validated.data };
}
