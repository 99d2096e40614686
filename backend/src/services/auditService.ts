import fs from 'fs';
import path from 'path';
import { config } from '../config.js';
import { isEmergency } from './triageService.js';
import type { ClassificationResult } from '../types.js';

export interface AuditEntry {
  at: string;
  type: 'session_start' | 'message' | 'classification' | 'emergency' | 'session_reset' | 'export' | 'error';
  sessionId?: string;
  payload?: Record<string, unknown>;
}

function ensureLogDir(): string {
  const dir = path.dirname(config.audit.logPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return config.audit.logPath;
}

export function logAudit(entry: AuditEntry): void {
  if (!config.audit.enabled) return;
  const line = JSON.stringify({
    ...entry,
    at: entry.at || new Date().toISOString(),
  }) + '\n';
  try {
    const file = ensureLogDir();
    fs.appendFileSync(file, line);
  } catch (e) {
    console.error('Audit log write failed:', e);
  }
}

export function auditSessionStart(sessionId: string): void {
  logAudit({
    at: new Date().toISOString(),
    type: 'session_start',
    sessionId,
  });
}

export function auditSessionReset(sessionId: string): void {
  logAudit({
    at: new Date().toISOString(),
    type: 'session_reset',
    sessionId,
  });
}

/** Records tier and categories only; symptom text stays out of the log. */
export function auditClassification(sessionId: string | undefined, result: ClassificationResult): void {
  const at = new Date().toISOString();
  const payload = {
    urgency: result.urgency,
    categories: [...result.matchedCategories],
    confidence: result.confidence,
    countryCode: result.countryCode,
  };
  logAudit({ at, type: 'classification', sessionId, payload });
  if (isEmergency(result)) {
    logAudit({ at, type: 'emergency', sessionId, payload });
  }
}

export function auditError(sessionId: string | undefined, error: unknown): void {
  logAudit({
    at: new Date().toISOString(),
    type: 'error',
    sessionId,
    payload: { message: error instanceof Error ? error.message : String(error) },
  });
}
