import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ConfigurationError } from '../errors/index.js';
import { formatZodIssues, fromZod } from '../utils/zod-utils.js';

import { createRule, type Rule } from './rule.js';

export interface RuleDefinition<T> {
  message: string;
  check: (value: T) => boolean;
}

const ruleDefinitionSchema = z.object({
  message: z.string().refine((message) => message.trim().length > 0, { message: 'Rule message must not be blank' }),
  check: z.custom<(value: unknown) => boolean>((check) => typeof check === 'function', {
    message: 'Rule check must be a function',
  }),
});

export const ruleSetSchema = z.array(ruleDefinitionSchema);

/**
 * Turn configuration-supplied `{ message, check }` pairs into frozen rules,
 * keeping their order.
 */
export function parseRuleSet<T>(definitions: unknown): Result<Rule<T>[], ConfigurationError> {
  const parsed = fromZod(ruleSetSchema, definitions);
  if (parsed.isErr()) {
    const issues = formatZodIssues(parsed.error);
    return err(
      new ConfigurationError('INVALID_RULE', `Invalid rule set:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, {
        additionalContext: { issues },
      })
    );
  }

  return ok(parsed.value.map((definition) => createRule<T>(definition.message, definition.check)));
}
