export { AlertRules, isOfficialRuleFormat, isSingleRuleFormat } from './alert-rules.js';
export type { AddPathOptions, AddRulesOptions } from './alert-rules.js';
export { LocalRuleFileSource, RULE_FILE_SUFFIXES, isRuleFile } from './rule-source.js';
export type { RuleFileSource, RulePathKind } from './rule-source.js';
