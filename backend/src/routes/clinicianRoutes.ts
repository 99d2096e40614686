import { Router } from 'express';
import {
  buildDashboardStats,
  formatTranscript,
  summarizeSession,
  toTranscriptPayload,
  toTriagePayload,
} from '../services/sessionExportService.js';
import { listSessions, requireSession } from '../store/sessionStore.js';
import { sendError } from './httpErrors.js';

const router = Router();

/**
 * GET /api/clinician/sessions
 * Read-only dashboard query: every live session, newest first, plus counts per tier.
 */
router.get('/api/clinician/sessions', (_req, res) => {
  const sessions = listSessions().sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  res.json({
    stats: buildDashboardStats(sessions),
    sessions: sessions.map(summarizeSession),
  });
});

router.get('/api/clinician/sessions/:id', (req, res) => {
  const { id } = req.params;
  try {
    const session = requireSession(id);
    return res.json({
      session: {
        ...summarizeSession(session),
        current_state: session.currentState,
        triage_result: session.lastClassification ? toTriagePayload(session.lastClassification) : null,
        messages: session.transcript.map(toTranscriptPayload),
        transcript_text: formatTranscript(session),
      },
    });
  } catch (e) {
    return sendError(res, e, id);
  }
});

export default router;
