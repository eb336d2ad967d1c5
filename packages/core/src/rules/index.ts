export { createDependentRule, createRule, type ContextReader, type Rule } from './rule.js';
export { email, equalTo, maxLength, minLength, pattern, range, required } from './library.js';
export { parseRuleSet, ruleSetSchema, type RuleDefinition } from './rule-set.js';
