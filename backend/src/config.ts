import dotenv from 'dotenv';

dotenv.config();

export type ConcurrencyPolicy = 'serialize' | 'reject-if-busy';

function parseConcurrency(value: string | undefined): ConcurrencyPolicy {
  return value === 'reject-if-busy' ? 'reject-if-busy' : 'serialize';
}

const nodeEnv = process.env.NODE_ENV ?? 'development';

export const config = {
  port: parseInt(process.env.PORT ?? '4000', 10),
  nodeEnv,
  triage: {
    defaultCountry: process.env.TRIAGE_DEFAULT_COUNTRY ?? 'US',
    rulesPath: process.env.TRIAGE_RULES_PATH ?? '',
    clarifyBelowWords: parseInt(process.env.TRIAGE_CLARIFY_BELOW_WORDS ?? '3', 10),
  },
  sessions: {
    ttlMinutes: parseInt(process.env.SESSION_TTL_MINUTES ?? '60', 10),
    // Rapid double-submission on one session: queue it (serialize) or answer 409 (reject-if-busy).
    concurrency: parseConcurrency(process.env.SESSION_CONCURRENCY),
  },
  audit: {
    enabled: (process.env.AUDIT_LOG_ENABLED ?? (nodeEnv === 'test' ? 'false' : 'true')) === 'true',
    logPath: process.env.AUDIT_LOG_PATH ?? './logs/audit.json',
  },
};

export function hasCustomRules(): boolean {
  return Boolean(config.triage.rulesPath);
}
