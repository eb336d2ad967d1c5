import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

/**
 * Validate an input against a Zod schema and return a neverthrow Result.
 */
export function fromZod<TOutput, TInput = TOutput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  input: unknown
): Result<TOutput, ZodError<TInput>> {
  const parsed = schema.safeParse(input);
  return parsed.success ? ok(parsed.data) : err(parsed.error);
}

/** One line per issue: `path: message`, with `(root)` for top-level issues */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}
