import { Router } from 'express';
import type { RuleTable } from '../services/ruleTable.js';
import { classifySymptoms } from '../services/triageService.js';
import { auditClassification } from '../services/auditService.js';
import { toTriagePayload } from '../services/sessionExportService.js';
import { optionalString, sendError } from './httpErrors.js';

export function createTriageRouter(rules: RuleTable): Router {
  const router = Router();

  /**
   * POST /api/triage
   * Stateless classification: { symptoms, age?, country_code?, translation_degraded? }.
   */
  router.post('/api/triage', (req, res) => {
    const { symptoms, age, country_code, translation_degraded } = req.body ?? {};
    if (typeof symptoms !== 'string') {
      return res.status(400).json({ error: 'symptoms must be a string' });
    }
    try {
      const result = classifySymptoms(symptoms, {
        age,
        countryCode: optionalString(country_code),
        rules,
        degradedInput: translation_degraded === true,
      });
      auditClassification(undefined, result);
      const triage = toTriagePayload(result);
      return res.json({ triage, is_emergency: triage.is_emergency });
    } catch (e) {
      return sendError(res, e);
    }
  });

  return router;
}
