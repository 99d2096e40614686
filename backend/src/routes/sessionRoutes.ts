import { Router } from 'express';
import type { RuleTable } from '../services/ruleTable.js';
import { handleUserMessage, openConversation, resetConversation } from '../services/conversationService.js';
import type { TurnResult } from '../services/conversationService.js';
import { auditClassification, auditSessionReset, auditSessionStart, logAudit } from '../services/auditService.js';
import { exportSession, toTranscriptPayload, toTriagePayload } from '../services/sessionExportService.js';
import { normalizeAge } from '../services/pediatricService.js';
import { createSession, requireSession } from '../store/sessionStore.js';
import type { SessionLock } from '../store/sessionLock.js';
import { optionalString, sendError } from './httpErrors.js';

export interface SessionRouterDeps {
  rules: RuleTable;
  lock: SessionLock;
  clarifyBelowWords: number;
}

function turnPayload(turn: TurnResult) {
  return {
    messages: turn.replies.map(toTranscriptPayload),
    state: turn.state,
    transitions: turn.transitions,
    triage: turn.classification ? toTriagePayload(turn.classification) : null,
    is_emergency: turn.isEmergency,
  };
}

export function createSessionRouter(deps: SessionRouterDeps): Router {
  const router = Router();
  const conversation = { rules: deps.rules, clarifyBelowWords: deps.clarifyBelowWords };

  router.post('/api/sessions', (req, res) => {
    const { user_id, age, country_code } = req.body ?? {};
    try {
      const session = createSession({
        userId: optionalString(user_id),
        patientAge: normalizeAge(age),
        countryCode: optionalString(country_code)?.toUpperCase(),
      });
      const turn = openConversation(session, conversation);
      auditSessionStart(session.sessionId);
      return res.status(201).json({ session_id: session.sessionId, ...turnPayload(turn) });
    } catch (e) {
      return sendError(res, e);
    }
  });

  /**
   * POST /api/sessions/:id/messages
   * { message, channel?: 'text' | 'voice', age?, country_code?, translation_degraded? }
   */
  router.post('/api/sessions/:id/messages', async (req, res) => {
    const { id } = req.params;
    const { message, channel, age, country_code, translation_degraded } = req.body ?? {};
    if (typeof message !== 'string' || !message.trim()) {
      return res.status(400).json({ error: 'message required' });
    }
    try {
      const turn = await deps.lock.run(id, () => {
        const session = requireSession(id);
        return handleUserMessage(
          session,
          {
            text: message,
            channel: channel === 'voice' ? 'voice' : 'text',
            age,
            countryCode: optionalString(country_code),
            degradedInput: translation_degraded === true,
          },
          conversation
        );
      });
      logAudit({ at: new Date().toISOString(), type: 'message', sessionId: id, payload: { state: turn.state } });
      if (turn.classification) auditClassification(id, turn.classification);
      return res.json(turnPayload(turn));
    } catch (e) {
      return sendError(res, e, id);
    }
  });

  router.get('/api/sessions/:id', (req, res) => {
    const { id } = req.params;
    try {
      const session = requireSession(id);
      return res.json({
        session_id: session.sessionId,
        state: session.currentState,
        messages: session.transcript.map(toTranscriptPayload),
        triage: session.lastClassification ? toTriagePayload(session.lastClassification) : null,
      });
    } catch (e) {
      return sendError(res, e, id);
    }
  });

  router.post('/api/sessions/:id/reset', async (req, res) => {
    const { id } = req.params;
    try {
      const turn = await deps.lock.run(id, () => resetConversation(requireSession(id), conversation));
      auditSessionReset(id);
      return res.json(turnPayload(turn));
    } catch (e) {
      return sendError(res, e, id);
    }
  });

  router.get('/api/sessions/:id/export', (req, res) => {
    const { id } = req.params;
    try {
      const data = exportSession(requireSession(id));
      logAudit({ at: new Date().toISOString(), type: 'export', sessionId: id });
      return res.json(data);
    } catch (e) {
      return sendError(res, e, id);
    }
  });

  return router;
}
