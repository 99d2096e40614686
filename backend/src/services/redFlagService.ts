/**
 * Red-flag detector: emergency-tier categories present in the text.
 * Every emergency category is checked so the caller sees all red flags, not just the first.
 */
import { defaultRuleTable, matchTier } from './ruleTable.js';
import type { RuleTable } from './ruleTable.js';
import { normalizeText } from './textNormalizer.js';
import type { MatchEvidence } from '../types.js';

export interface RedFlagCheckResult {
  triggered: boolean;
  categories: string[]; // rule-table order
  evidence: MatchEvidence[];
}

export function checkRedFlags(userText: string, rules: RuleTable = defaultRuleTable): RedFlagCheckResult {
  const evidence = matchTier(rules, normalizeText(userText), 'emergency');
  return {
    triggered: evidence.length > 0,
    categories: evidence.map((e) => e.category),
    evidence,
  };
}

export function detectRedFlags(userText: string, rules: RuleTable = defaultRuleTable): string[] {
  return checkRedFlags(userText, rules).categories;
}
