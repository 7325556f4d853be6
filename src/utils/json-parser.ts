/**
 * JSON extraction from agent output.
 * Finds JSON in markdown code blocks or bare text and validates it against a
 * zod schema. The first candidate that parses and validates wins.
 */

import type { z } from 'zod';

export class JSONExtractionError extends Error {
  constructor(
    message: string,
    public readonly rawOutput: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'JSONExtractionError';
  }
}

const CANDIDATE_PATTERNS = [
  // JSON in markdown code blocks with json tag
  /```json\s*([\s\S]*?)```/,
  // JSON in generic markdown code blocks
  /```\s*([\s\S]*?)```/,
  // Bare JSON object
  /(\{[\s\S]*\})/,
  // JSON array
  /(\[[\s\S]*\])/,
];

/**
 * Extract and validate JSON embedded in free text.
 * @throws JSONExtractionError if no candidate both parses and validates
 */
export function extractJSON<S extends z.ZodTypeAny>(output: string, schema: S): z.infer<S> {
  const issues: string[] = [];

  for (const pattern of CANDIDATE_PATTERNS) {
    const match = output.match(pattern);
    if (!match) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(match[1].trim());
    } catch (e) {
      issues.push(e instanceof Error ? e.message : String(e));
      continue;
    }

    const result = schema.safeParse(parsed);
    if (result.success) {
      return result.data;
    }
    for (const issue of result.error.issues) {
      issues.push(`${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
  }

  throw new JSONExtractionError(
    issues.length > 0 ? 'No JSON in output matched the expected shape' : 'No JSON found in output',
    output.slice(0, 500),
    issues
  );
}
