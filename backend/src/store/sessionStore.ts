import { v4 as uuidv4 } from 'uuid';
import { config } from '../config.js';
import { SessionNotFoundError } from '../errors.js';
import type { Session } from '../types.js';

const sessions = new Map<string, Session>();

function ttlMs(): number {
  return config.sessions.ttlMinutes * 60 * 1000;
}

function isExpired(session: Session, now: Date): boolean {
  return now.getTime() - Date.parse(session.lastActivityAt) > ttlMs();
}

export function createSession(
  init: { userId?: string; patientAge?: number; countryCode?: string } = {},
  now: Date = new Date()
): Session {
  evictExpiredSessions(now);
  const sessionId = uuidv4();
  const at = now.toISOString();
  const session: Session = {
    sessionId,
    userId: init.userId ?? `user_${sessionId.slice(0, 8)}`,
    createdAt: at,
    lastActivityAt: at,
    transcript: [],
    currentState: 'greeting',
    accumulatedSymptomText: '',
    patientAge: init.patientAge,
    countryCode: init.countryCode ?? config.triage.defaultCountry,
    clarificationCount: 0,
  };
  sessions.set(sessionId, session);
  return session;
}

/** Missing and expired sessions look the same to callers; expired ones are evicted here. */
export function getSession(id: string, now: Date = new Date()): Session | undefined {
  const s = sessions.get(id);
  if (!s) return undefined;
  if (isExpired(s, now)) {
    sessions.delete(id);
    return undefined;
  }
  return s;
}

export function requireSession(id: string, now: Date = new Date()): Session {
  const s = getSession(id, now);
  if (!s) throw new SessionNotFoundError(id);
  return s;
}

export function touchSession(session: Session, now: Date = new Date()): void {
  session.lastActivityAt = now.toISOString();
}

export function listSessions(now: Date = new Date()): Session[] {
  evictExpiredSessions(now);
  return Array.from(sessions.values());
}

export function evictExpiredSessions(now: Date = new Date()): number {
  let evicted = 0;
  for (const [id, s] of sessions) {
    if (isExpired(s, now)) {
      sessions.delete(id);
      evicted++;
    }
  }
  return evicted;
}

export function deleteSession(id: string): boolean {
  return sessions.delete(id);
}

export function clearSessions(): void {
  sessions.clear();
}
