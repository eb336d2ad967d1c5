import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '../../errors/index.js';
import { parseRuleSet } from '../rule-set.js';

describe('parseRuleSet', () => {
  it('builds rules in definition order', () => {
    const result = parseRuleSet<string>([
      { message: 'Required.', check: (value: string) => value.length > 0 },
      { message: 'No spaces.', check: (value: string) => !value.includes(' ') },
    ]);

    expect(result.isOk()).toBe(true);
    const rules = result._unsafeUnwrap();
    expect(rules.map((rule) => rule.message)).toEqual(['Required.', 'No spaces.']);
    expect(rules[1]?.check('a b')).toBe(false);
  });

  it('accepts an empty rule set', () => {
    expect(parseRuleSet([])._unsafeUnwrap()).toEqual([]);
  });

  it('rejects blank messages and non-function checks with every issue listed', () => {
    const result = parseRuleSet([
      { message: '  ', check: () => true },
      { message: 'Valid message.', check: 'not a function' },
    ]);

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.code).toBe('INVALID_RULE');
    expect(error.message).toBe(
      'Invalid rule set:\n  - 0.message: Rule message must not be blank\n  - 1.check: Rule check must be a function'
    );
  });

  it('rejects input that is not a list', () => {
    const error = parseRuleSet({ message: 'x', check: () => true })._unsafeUnwrapErr();

    expect(error.code).toBe('INVALID_RULE');
    expect(error.context).toEqual({ issues: ['(root): Expected array, received object'] });
  });
});
