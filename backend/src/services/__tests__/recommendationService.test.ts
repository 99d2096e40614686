import { generateRecommendations, resolveEmergencyNumber } from '../recommendationService';
import { URGENCY_ORDER } from '../../types';

describe('recommendationService', () => {
  it('has non-empty guidance for every tier', () => {
    for (const urgency of URGENCY_ORDER) {
      const out = generateRecommendations({ urgency, matchedCategories: [] });
      expect(out.recommendations.length).toBeGreaterThan(0);
      expect(out.nextSteps.length).toBeGreaterThan(0);
    }
  });

  it('falls back to the US number for unknown countries', () => {
    expect(resolveEmergencyNumber('ZZ')).toEqual({ countryCode: 'US', emergencyNumber: '911' });
    expect(resolveEmergencyNumber(undefined)).toEqual({ countryCode: 'US', emergencyNumber: '911' });
    const out = generateRecommendations({ urgency: 'emergency', matchedCategories: [] }, { countryCode: 'ZZ' });
    expect(out.emergencyNumber).toBe('911');
    expect(out.nextSteps[0]).toBe('Call emergency services immediately (911)');
  });

  it('resolves regional numbers case-insensitively', () => {
    expect(resolveEmergencyNumber(' uk ').emergencyNumber).toBe('999');
    expect(resolveEmergencyNumber('IN').emergencyNumber).toBe('108');
    const out = generateRecommendations({ urgency: 'urgent', matchedCategories: [] }, { countryCode: 'eu' });
    expect(out.nextSteps[3]).toBe('Go to the ER or call 112 if symptoms worsen');
  });

  it('appends category guidance once, in match order', () => {
    const out = generateRecommendations({
      urgency: 'emergency',
      matchedCategories: ['chest_pain', 'breathing', 'unknown_category'],
    });
    expect(out.recommendations).toEqual([
      'This may be a medical emergency',
      'Do not delay seeking immediate medical attention',
      'Do not drive yourself - call for emergency transport if needed',
      'Stop any physical activity and rest while you wait for help',
      'Sit upright and try to stay calm while help is on the way',
    ]);
  });

  it('asks for professional review when information was insufficient', () => {
    const out = generateRecommendations({ urgency: 'outpatient', matchedCategories: [], insufficientInformation: true });
    expect(out.recommendations).toHaveLength(4);
    expect(out.recommendations[3]).toBe(
      'We could not identify specific symptoms from your description - please have a healthcare professional review your concerns'
    );
  });

  it('adds no guidance for categories named like built-in object members', () => {
    const out = generateRecommendations({ urgency: 'urgent', matchedCategories: ['constructor', 'toString', '__proto__'] });
    expect(out.recommendations).toEqual([
      'Your symptoms require prompt medical attention',
      'Seek care within the next 24 hours',
      'Monitor symptoms closely for any worsening',
    ]);
  });
});
