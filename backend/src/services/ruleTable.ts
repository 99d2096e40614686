import fs from 'fs';
import bundledRules from '../data/triggerRules.json';
import { RuleTableError } from '../errors.js';
import { normalizeText } from './textNormalizer.js';
import { isUrgencyLevel, URGENCY_ORDER } from '../types.js';
import type { MatchEvidence, TriggerRule, UrgencyLevel } from '../types.js';

/**
 * Read-only keyword table shared by every session. Built once at startup and
 * passed by reference; nothing mutates it afterwards.
 */
export interface RuleTable {
  readonly rules: readonly TriggerRule[];
  lookup(tier: UrgencyLevel): readonly TriggerRule[];
  tierOf(category: string): UrgencyLevel | undefined;
}

export function createRuleTable(rules: readonly TriggerRule[]): RuleTable {
  const tiers = new Map<string, UrgencyLevel>();
  const frozen: TriggerRule[] = [];

  rules.forEach((rule, index) => {
    const where = `rule #${index} (${rule.category || 'unnamed'})`;
    if (!rule.category.trim()) throw new RuleTableError(`${where}: category is required`);
    if (!isUrgencyLevel(rule.tier)) throw new RuleTableError(`${where}: unknown tier "${String(rule.tier)}"`);
    if (!(rule.baseConfidence >= 0 && rule.baseConfidence <= 1)) {
      throw new RuleTableError(`${where}: baseConfidence must be within [0, 1]`);
    }
    const existing = tiers.get(rule.category);
    if (existing === rule.tier) throw new RuleTableError(`${where}: duplicate category in tier ${rule.tier}`);
    if (existing) {
      throw new RuleTableError(`${where}: category already registered in tier ${existing}, cannot also be ${rule.tier}`);
    }

    // Same normalizer as the input text, or a phrase could never match.
    const phrases = Array.from(new Set(rule.phrases.map(normalizeText).filter(Boolean)));
    if (!phrases.length) throw new RuleTableError(`${where}: at least one phrase is required`);

    tiers.set(rule.category, rule.tier);
    frozen.push(
      Object.freeze({
        category: rule.category,
        tier: rule.tier,
        baseConfidence: rule.baseConfidence,
        phrases: Object.freeze(phrases),
      })
    );
  });

  const byTier = new Map<UrgencyLevel, readonly TriggerRule[]>(
    URGENCY_ORDER.map((tier) => [tier, Object.freeze(frozen.filter((r) => r.tier === tier))])
  );
  const all = Object.freeze(frozen);

  return Object.freeze({
    rules: all,
    lookup: (tier: UrgencyLevel) => byTier.get(tier) ?? [],
    tierOf: (category: string) => tiers.get(category),
  });
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}

/** Validates an untrusted rule list (bundled JSON or a customization file). */
export function parseRuleTable(raw: unknown): RuleTable {
  if (!Array.isArray(raw)) throw new RuleTableError('rule table must be a JSON array');
  const rules = raw.map((item, index): TriggerRule => {
    const obj = asRecord(item);
    if (!obj) throw new RuleTableError(`rule #${index}: expected an object`);
    const { category, tier, baseConfidence, phrases } = obj;
    if (typeof category !== 'string') throw new RuleTableError(`rule #${index}: category must be a string`);
    if (!isUrgencyLevel(tier)) throw new RuleTableError(`rule #${index} (${category}): unknown tier "${String(tier)}"`);
    if (typeof baseConfidence !== 'number') {
      throw new RuleTableError(`rule #${index} (${category}): baseConfidence must be a number`);
    }
    if (!Array.isArray(phrases) || !phrases.every((p): p is string => typeof p === 'string')) {
      throw new RuleTableError(`rule #${index} (${category}): phrases must be an array of strings`);
    }
    return { category, tier, baseConfidence, phrases };
  });
  return createRuleTable(rules);
}

export function loadRuleTableFromFile(filePath: string): RuleTable {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    throw new RuleTableError(`could not read rule table ${filePath}: ${String(e)}`);
  }
  return parseRuleTable(raw);
}

/** Matches every rule of one tier against already-normalized text, in table order. */
export function matchTier(table: RuleTable, normalizedText: string, tier: UrgencyLevel): MatchEvidence[] {
  const matches: MatchEvidence[] = [];
  for (const rule of table.lookup(tier)) {
    const found = rule.phrases.filter((phrase) => normalizedText.includes(phrase));
    if (found.length) {
      matches.push({ category: rule.category, tier, phrases: found, baseConfidence: rule.baseConfidence });
    }
  }
  return matches;
}

export const defaultRuleTable: RuleTable = parseRuleTable(bundledRules);
