import express from 'express';
import cors from 'cors';
import { config, hasCustomRules } from './config.js';
import { defaultRuleTable, loadRuleTableFromFile } from './services/ruleTable.js';
import type { RuleTable } from './services/ruleTable.js';
import { SessionLock } from './store/sessionLock.js';
import { createTriageRouter } from './routes/triageRoutes.js';
import { createSessionRouter } from './routes/sessionRoutes.js';
import clinicianRoutes from './routes/clinicianRoutes.js';

export interface AppOptions {
  rules?: RuleTable;
  lock?: SessionLock;
}

/** Loads the rule table named by TRIAGE_RULES_PATH; a bad table stops startup here. */
export function loadConfiguredRules(): RuleTable {
  return hasCustomRules() ? loadRuleTableFromFile(config.triage.rulesPath) : defaultRuleTable;
}

export function createApp(options: AppOptions = {}) {
  const rules = options.rules ?? loadConfiguredRules();
  const lock = options.lock ?? new SessionLock(config.sessions.concurrency);

  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json({ limit: '256kb' }));

  app.use(createTriageRouter(rules));
  app.use(createSessionRouter({ rules, lock, clarifyBelowWords: config.triage.clarifyBelowWords }));
  app.use(clinicianRoutes);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'carepath-api', rules: rules.rules.length, concurrency: lock.policy });
  });

  return app;
}
