/**
 * Age-gated escalation for young children. These rules live in code, not in the
 * rule table, so customizing the generic table can never weaken them.
 */
import { normalizeText } from './textNormalizer.js';
import type { MatchEvidence, UrgencyLevel } from '../types.js';

export const INFANT_FEVER_RULE = 'pediatric_infant_fever';
export const TODDLER_BREATHING_RULE = 'pediatric_breathing_difficulty';

const MAX_PLAUSIBLE_AGE = 120;

const FEVER_MARKERS = /\b(fever|feverish|temperature|temp)\b/;
const FEVER_THRESHOLD_F = 100.4;

const BREATHING_PHRASES = [
  'difficulty breathing',
  'trouble breathing',
  'hard to breathe',
  'struggling to breathe',
  'shortness of breath',
  "can't breathe",
  'cannot breathe',
  'breathing fast',
  'wheezing',
  'gasping',
];

export interface PediatricAssessment {
  urgency: UrgencyLevel;
  rule: string;
  evidence: MatchEvidence;
}

/** Ages that are non-numeric, negative, non-finite or implausible count as "no age". */
export function normalizeAge(age: unknown): number | undefined {
  const value = typeof age === 'string' && age.trim() !== '' ? Number(age) : age;
  if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
  if (value < 0 || value > MAX_PLAUSIBLE_AGE) return undefined;
  return value;
}

/**
 * Temperature readings in the text, in Fahrenheit. A number counts when it carries
 * a unit or falls in a body-temperature range (35–45 read as °C, 90–115 as °F).
 */
export function extractTemperaturesF(normalized: string): number[] {
  const readings: number[] = [];
  const pattern = /(\d{2,3}(?:\.\d+)?)\s*(?:°|º|degrees?|deg)?\s*(fahrenheit|celsius|f|c)?\b/g;
  for (const match of normalized.matchAll(pattern)) {
    const value = Number(match[1]);
    const unit = match[2]?.charAt(0);
    if (unit === 'c' || (!unit && value >= 35 && value <= 45)) {
      readings.push((value * 9) / 5 + 32);
    } else if (unit === 'f' || (value >= 90 && value <= 115)) {
      readings.push(value);
    }
  }
  return readings;
}

function hasFeverAtThreshold(normalized: string): string | undefined {
  if (!FEVER_MARKERS.test(normalized)) return undefined;
  // Tolerance keeps a 38.0 °C reading (100.4 °F after conversion) on the threshold.
  const over = extractTemperaturesF(normalized).find((f) => f >= FEVER_THRESHOLD_F - 1e-9);
  return over === undefined ? undefined : `fever ${over.toFixed(1)}°F`;
}

export function assessPediatric(age: unknown, text: string): PediatricAssessment | undefined {
  const years = normalizeAge(age);
  if (years === undefined) return undefined;
  const normalized = normalizeText(text);

  if (years < 1) {
    const marker = hasFeverAtThreshold(normalized);
    if (marker) {
      return {
        urgency: 'emergency',
        rule: INFANT_FEVER_RULE,
        evidence: { category: INFANT_FEVER_RULE, tier: 'emergency', phrases: [marker], baseConfidence: 0.9 },
      };
    }
  }

  if (years < 5) {
    const found = BREATHING_PHRASES.filter((p) => normalized.includes(p));
    if (found.length) {
      return {
        urgency: 'emergency',
        rule: TODDLER_BREATHING_RULE,
        evidence: { category: TODDLER_BREATHING_RULE, tier: 'emergency', phrases: found, baseConfidence: 0.9 },
      };
    }
  }

  return undefined;
}
