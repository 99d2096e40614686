import path from 'path';
import {
  createRuleTable,
  defaultRuleTable,
  loadRuleTableFromFile,
  matchTier,
  parseRuleTable,
} from '../ruleTable';
import { classifySymptoms } from '../triageService';
import { RuleTableError } from '../../errors';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

describe('ruleTable', () => {
  it('keeps emergency categories in definition order', () => {
    expect(defaultRuleTable.lookup('emergency').map((r) => r.category)).toEqual([
      'chest_pain',
      'breathing',
      'neurological',
      'bleeding',
      'trauma',
      'allergic',
      'self_harm',
      'pediatric_emergency',
    ]);
    expect(defaultRuleTable.lookup('self_care').map((r) => r.category)).toEqual(['minor']);
  });

  it('maps each category to exactly one tier', () => {
    expect(defaultRuleTable.tierOf('skin')).toBe('outpatient');
    expect(defaultRuleTable.tierOf('infection')).toBe('urgent');
    expect(defaultRuleTable.tierOf('no_such_category')).toBeUndefined();
  });

  it('is frozen after construction', () => {
    expect(Object.isFrozen(defaultRuleTable)).toBe(true);
    expect(Object.isFrozen(defaultRuleTable.rules)).toBe(true);
    expect(Object.isFrozen(defaultRuleTable.lookup('urgent')[0].phrases)).toBe(true);
  });

  it('normalizes phrases to lowercase single-spaced text', () => {
    const table = createRuleTable([
      { category: 'cardiac', tier: 'emergency', baseConfidence: 0.9, phrases: ['  Chest   PAIN ', 'chest pain'] },
    ]);
    expect(table.lookup('emergency')[0].phrases).toEqual(['chest pain']);
  });

  it('rejects a category registered in two tiers', () => {
    expect(() =>
      createRuleTable([
        { category: 'fever', tier: 'urgent', baseConfidence: 0.8, phrases: ['high fever'] },
        { category: 'fever', tier: 'outpatient', baseConfidence: 0.7, phrases: ['mild fever'] },
      ])
    ).toThrow('rule #1 (fever): category already registered in tier urgent, cannot also be outpatient');
  });

  it('rejects empty phrase lists and out-of-range confidence', () => {
    expect(() => createRuleTable([{ category: 'x', tier: 'urgent', baseConfidence: 0.8, phrases: ['  '] }])).toThrow(
      RuleTableError
    );
    expect(() => createRuleTable([{ category: 'x', tier: 'urgent', baseConfidence: 1.5, phrases: ['a'] }])).toThrow(
      'rule #0 (x): baseConfidence must be within [0, 1]'
    );
  });

  it('validates untrusted input shape', () => {
    expect(() => parseRuleTable({ rules: [] })).toThrow('rule table must be a JSON array');
    expect(() => parseRuleTable([{ category: 'a', tier: 'critical', baseConfidence: 0.9, phrases: ['a'] }])).toThrow(
      'rule #0 (a): unknown tier "critical"'
    );
    expect(() => parseRuleTable([{ category: 'a', tier: 'urgent', baseConfidence: 0.9, phrases: [1] }])).toThrow(
      'rule #0 (a): phrases must be an array of strings'
    );
  });

  it('loads a custom table from disk', () => {
    const table = loadRuleTableFromFile(fixture('customRules.json'));
    expect(table.lookup('emergency')[0]).toEqual({
      category: 'cardiac',
      tier: 'emergency',
      baseConfidence: 0.95,
      phrases: ['chest pain', 'palpitations'],
    });
    expect(table.lookup('outpatient')).toEqual([]);
  });

  it('fails fast on a conflicting custom table', () => {
    expect(() => loadRuleTableFromFile(fixture('conflictingRules.json'))).toThrow(RuleTableError);
    expect(() => loadRuleTableFromFile(fixture('missing.json'))).toThrow(/could not read rule table/);
  });

  it('matches all rules of a tier in table order', () => {
    expect(matchTier(defaultRuleTable, 'a rash and a sore throat', 'outpatient')).toEqual([
      { category: 'mild_infection', tier: 'outpatient', phrases: ['sore throat'], baseConfidence: 0.7 },
      { category: 'skin', tier: 'outpatient', phrases: ['rash'], baseConfidence: 0.7 },
    ]);
  });

  it('reads typographic apostrophes in phrases the same way as in symptom text', () => {
    const rules = parseRuleTable([
      { category: 'breath', tier: 'emergency', baseConfidence: 0.9, phrases: ['Can’t Breathe'] },
    ]);
    expect(rules.lookup('emergency')[0].phrases).toEqual(["can't breathe"]);
    expect(classifySymptoms('I can’t breathe', { rules }).matchedCategories).toEqual(['breath']);
    expect(classifySymptoms("I can't breathe", { rules }).urgency).toBe('emergency');
  });
});
