import fs from 'fs';
import { auditClassification } from '../auditService';
import { classifySymptoms } from '../triageService';
import { config } from '../../config';

interface LoggedEntry {
  type: string;
  sessionId?: string;
  payload?: Record<string, unknown>;
}

describe('auditService', () => {
  const enabled = config.audit.enabled;
  let lines: string[];

  beforeEach(() => {
    lines = [];
    config.audit.enabled = true;
    jest.spyOn(fs, 'existsSync').mockReturnValue(true);
    jest.spyOn(fs, 'appendFileSync').mockImplementation((_file, data) => {
      lines.push(String(data));
    });
  });

  afterEach(() => {
    config.audit.enabled = enabled;
    jest.restoreAllMocks();
  });

  const logged = () => lines.map((l) => JSON.parse(l) as LoggedEntry);

  it('adds an emergency entry after the classification of an emergency', () => {
    auditClassification('s1', classifySymptoms('I have severe chest pain'));
    const entries = logged();
    expect(entries.map((e) => e.type)).toEqual(['classification', 'emergency']);
    expect(entries[1].sessionId).toBe('s1');
    expect(entries[1].payload).toEqual({
      urgency: 'emergency',
      categories: ['chest_pain'],
      confidence: 0.9,
      countryCode: 'US',
    });
  });

  it('logs only the classification for lower tiers', () => {
    auditClassification(undefined, classifySymptoms('I have a rash on my arm'));
    expect(logged().map((e) => e.type)).toEqual(['classification']);
  });

  it('writes nothing while disabled', () => {
    config.audit.enabled = false;
    auditClassification('s1', classifySymptoms('I have severe chest pain'));
    expect(lines).toEqual([]);
  });
});
