import { checkRedFlags } from './redFlagService.js';
import { assessPediatric } from './pediatricService.js';
import { generateRecommendations } from './recommendationService.js';
import { defaultRuleTable, matchTier } from './ruleTable.js';
import type { RuleTable } from './ruleTable.js';
import { normalizeText } from './textNormalizer.js';
import type { ClassificationResult, MatchEvidence, UrgencyLevel } from '../types.js';

export const MIN_SYMPTOM_CHARS = 3;

// Fixed per tier: the score reports trust in the tier ordering, not in any single match.
export const TIER_CONFIDENCE: Readonly<Record<UrgencyLevel, number>> = {
  emergency: 0.9,
  urgent: 0.8,
  outpatient: 0.7,
  self_care: 0.6,
};

export interface ClassifyOptions {
  age?: unknown;
  countryCode?: string;
  rules?: RuleTable;
  /** Upstream translation or transcription could not fully process the text. */
  degradedInput?: boolean;
  /** Text that matches no rule in any tier is insufficient information (outpatient), not self-care. */
  unmatchedIsInsufficient?: boolean;
}

interface TierDecision {
  urgency: UrgencyLevel;
  evidence: MatchEvidence[];
  insufficientInformation: boolean;
}

function decideTier(normalized: string, age: unknown, rules: RuleTable, unmatchedIsInsufficient: boolean): TierDecision {
  // Too little to go on: route to a clinician rather than to home care.
  if (normalized.length < MIN_SYMPTOM_CHARS) {
    return { urgency: 'outpatient', evidence: [], insufficientInformation: true };
  }

  const pediatric = assessPediatric(age, normalized);
  if (pediatric) {
    return { urgency: pediatric.urgency, evidence: [pediatric.evidence], insufficientInformation: false };
  }

  const red = checkRedFlags(normalized, rules);
  if (red.triggered) {
    return { urgency: 'emergency', evidence: red.evidence, insufficientInformation: false };
  }

  for (const tier of ['urgent', 'outpatient'] as const) {
    const evidence = matchTier(rules, normalized, tier);
    if (evidence.length) return { urgency: tier, evidence, insufficientInformation: false };
  }

  if (unmatchedIsInsufficient && !matchTier(rules, normalized, 'self_care').length) {
    return { urgency: 'outpatient', evidence: [], insufficientInformation: true };
  }
  return { urgency: 'self_care', evidence: [], insufficientInformation: false };
}

/**
 * Assigns an urgency tier to free-text symptoms. Checks run in strict priority
 * order (pediatric, red flags, urgent, outpatient) and stop at the first tier
 * with a match. Total and deterministic: any string and any age produce a result.
 */
export function classifySymptoms(text: string, options: ClassifyOptions = {}): ClassificationResult {
  const rules = options.rules ?? defaultRuleTable;
  const normalized = normalizeText(text);
  const decision = decideTier(normalized, options.age, rules, options.unmatchedIsInsufficient ?? false);
  const matchedCategories = decision.evidence.map((e) => e.category);

  const advice = generateRecommendations(
    { urgency: decision.urgency, matchedCategories, insufficientInformation: decision.insufficientInformation },
    { countryCode: options.countryCode, degradedInput: options.degradedInput }
  );

  return Object.freeze({
    urgency: decision.urgency,
    matchedCategories: Object.freeze(matchedCategories),
    confidence: TIER_CONFIDENCE[decision.urgency],
    recommendations: Object.freeze(advice.recommendations),
    nextSteps: Object.freeze(advice.nextSteps),
    evidence: Object.freeze(decision.evidence),
    insufficientInformation: decision.insufficientInformation,
    countryCode: advice.countryCode,
    emergencyNumber: advice.emergencyNumber,
  });
}

/** The single source of the emergency flag handed to presentation layers. */
export function isEmergency(result: Pick<ClassificationResult, 'urgency'>): boolean {
  return result.urgency === 'emergency';
}
