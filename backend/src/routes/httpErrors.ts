import type { Response } from 'express';
import { SessionBusyError, SessionNotFoundError } from '../errors.js';
import { auditError } from '../services/auditService.js';

export function sendError(res: Response, error: unknown, sessionId?: string) {
  if (error instanceof SessionNotFoundError) {
    return res.status(404).json({ error: error.message, needs_new_session: true });
  }
  if (error instanceof SessionBusyError) {
    return res.status(409).json({ error: error.message });
  }
  console.error('Request failed:', error);
  auditError(sessionId, error);
  return res.status(500).json({ error: 'Internal error', details: String(error) });
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}
