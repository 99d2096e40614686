import { config } from '../config.js';
import type { UrgencyLevel } from '../types.js';

export const EMERGENCY_NUMBERS: Readonly<Record<string, string>> = {
  US: '911',
  IN: '108',
  UK: '999',
  EU: '112',
};

const FALLBACK_COUNTRY = 'US';

const TEMPLATES: Record<UrgencyLevel, { recommendations: string[]; nextSteps: string[] }> = {
  emergency: {
    recommendations: [
      'This may be a medical emergency',
      'Do not delay seeking immediate medical attention',
      'Do not drive yourself - call for emergency transport if needed',
    ],
    nextSteps: [
      'Call emergency services immediately ({number})',
      'Go to the nearest emergency room',
      'Contact emergency contacts or family members',
    ],
  },
  urgent: {
    recommendations: [
      'Your symptoms require prompt medical attention',
      'Seek care within the next 24 hours',
      'Monitor symptoms closely for any worsening',
    ],
    nextSteps: [
      'Contact your primary care doctor',
      'Visit an urgent care clinic',
      'Consider telemedicine consultation',
      'Go to the ER or call {number} if symptoms worsen',
    ],
  },
  outpatient: {
    recommendations: [
      'Your symptoms should be evaluated by a healthcare provider',
      'Schedule an appointment within the next few days',
      'Monitor symptoms and note any changes',
    ],
    nextSteps: [
      'Schedule telemedicine consultation',
      'Book appointment with primary care doctor',
      'Visit local clinic',
      'Try home remedies while waiting for appointment',
    ],
  },
  self_care: {
    recommendations: [
      'Your symptoms appear mild and may be managed at home',
      'Continue monitoring your symptoms',
      'Seek medical attention if symptoms worsen or persist',
    ],
    nextSteps: [
      'Rest and stay hydrated',
      'Use over-the-counter remedies as appropriate',
      'Monitor symptoms for 24-48 hours',
      'Contact healthcare provider if no improvement',
    ],
  },
};

// Extra guidance for specific categories, appended after the tier template.
const CATEGORY_GUIDANCE: ReadonlyMap<string, string> = new Map([
  ['chest_pain', 'Stop any physical activity and rest while you wait for help'],
  ['breathing', 'Sit upright and try to stay calm while help is on the way'],
  ['neurological', 'Note the time the symptoms started and tell the responders'],
  ['bleeding', 'Apply firm, steady pressure to the wound with a clean cloth'],
  ['trauma', 'Keep the injured person still unless they are in danger where they are'],
  ['allergic', 'Move away from the suspected trigger if you can do so safely'],
  ['self_harm', 'You do not have to go through this alone - stay with someone you trust until help arrives'],
  ['pediatric_emergency', 'Keep the child with you and bring any medicines they have taken'],
  ['pediatric_infant_fever', 'Infants under 1 year with a temperature of 100.4°F (38°C) or higher need immediate medical evaluation'],
  ['pediatric_breathing_difficulty', 'Young children can get worse quickly when breathing is hard - do not wait to see if it improves'],
  ['infection', 'Keep track of your temperature and how long the fever has lasted'],
  ['respiratory', 'Note any blood, color changes or fever that come with the cough'],
  ['pediatric_urgent', 'Offer the child small sips of fluid often and watch for signs of dehydration'],
]);

const INSUFFICIENT_INFORMATION_NOTE =
  'We could not identify specific symptoms from your description - please have a healthcare professional review your concerns';

const DEGRADED_INPUT_NOTE =
  'Part of your message may not have been understood correctly - please confirm this guidance with a healthcare professional';

export interface RecommendationDraft {
  urgency: UrgencyLevel;
  matchedCategories: readonly string[];
  insufficientInformation?: boolean;
}

export interface RecommendationOptions {
  countryCode?: string;
  degradedInput?: boolean;
}

export interface Recommendations {
  recommendations: string[];
  nextSteps: string[];
  countryCode: string;
  emergencyNumber: string;
}

/** Unknown or missing codes resolve to the US number. */
export function resolveEmergencyNumber(countryCode?: string): { countryCode: string; emergencyNumber: string } {
  const code = (countryCode ?? '').trim().toUpperCase();
  const number = EMERGENCY_NUMBERS[code];
  if (number) return { countryCode: code, emergencyNumber: number };
  return { countryCode: FALLBACK_COUNTRY, emergencyNumber: EMERGENCY_NUMBERS[FALLBACK_COUNTRY] };
}

export function generateRecommendations(
  draft: RecommendationDraft,
  options: RecommendationOptions = {}
): Recommendations {
  const { countryCode, emergencyNumber } = resolveEmergencyNumber(options.countryCode ?? config.triage.defaultCountry);
  const fill = (line: string) => line.replace('{number}', emergencyNumber);
  const template = TEMPLATES[draft.urgency];

  const recommendations = template.recommendations.map(fill);
  for (const category of draft.matchedCategories) {
    const guidance = CATEGORY_GUIDANCE.get(category);
    if (guidance && !recommendations.includes(guidance)) recommendations.push(guidance);
  }
  if (draft.insufficientInformation) recommendations.push(INSUFFICIENT_INFORMATION_NOTE);
  if (options.degradedInput) recommendations.push(DEGRADED_INPUT_NOTE);

  return {
    recommendations,
    nextSteps: template.nextSteps.map(fill),
    countryCode,
    emergencyNumber,
  };
}
