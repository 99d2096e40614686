import { formatTranscriptEntry } from './conversationService.js';
import { isEmergency } from './triageService.js';
import type {
  ClassificationResult,
  Session,
  SessionExport,
  TranscriptEntry,
  TranscriptEntryPayload,
  TriageResultPayload,
  UrgencyLevel,
} from '../types.js';

export function toTriagePayload(result: ClassificationResult): TriageResultPayload {
  return {
    urgency: result.urgency,
    matched_categories: [...result.matchedCategories],
    confidence: result.confidence,
    recommendations: [...result.recommendations],
    next_steps: [...result.nextSteps],
    is_emergency: isEmergency(result),
    insufficient_information: result.insufficientInformation,
    country_code: result.countryCode,
    emergency_number: result.emergencyNumber,
  };
}

export function toTranscriptPayload(entry: TranscriptEntry): TranscriptEntryPayload {
  const base = {
    id: entry.id,
    sender: entry.sender,
    message: entry.text,
    message_type: entry.messageType,
    timestamp: entry.timestamp,
  };
  switch (entry.messageType) {
    case 'assessment':
      return { ...base, urgency: entry.urgency };
    case 'emergency':
      return { ...base, emergency_number: entry.emergencyNumber };
    case 'text':
      return entry.sender === 'user' ? { ...base, channel: entry.channel } : base;
    default: {
      const unreachable: never = entry;
      return unreachable;
    }
  }
}

function userSymptoms(session: Session): string {
  return session.transcript
    .filter((t) => t.sender === 'user')
    .map((t) => t.text)
    .join(' ');
}

export function exportSession(session: Session): SessionExport {
  return {
    session_id: session.sessionId,
    user_id: session.userId,
    created_at: session.createdAt,
    symptoms: userSymptoms(session),
    triage_result: session.lastClassification ? toTriagePayload(session.lastClassification) : null,
    conversation: session.transcript.map(toTranscriptPayload),
  };
}

export interface SessionSummary {
  session_id: string;
  user_id: string;
  created_at: string;
  symptoms: string;
  triage_result: TriageResultPayload | null;
  message_count: number;
  status: Session['currentState'];
}

export function summarizeSession(session: Session): SessionSummary {
  return {
    session_id: session.sessionId,
    user_id: session.userId,
    created_at: session.createdAt,
    symptoms: userSymptoms(session),
    triage_result: session.lastClassification ? toTriagePayload(session.lastClassification) : null,
    message_count: session.transcript.length,
    status: session.currentState,
  };
}

export interface DashboardStats {
  total_sessions: number;
  unassessed: number;
  by_urgency: Record<UrgencyLevel, number>;
}

export function buildDashboardStats(sessions: readonly Session[]): DashboardStats {
  const byUrgency: Record<UrgencyLevel, number> = { emergency: 0, urgent: 0, outpatient: 0, self_care: 0 };
  let unassessed = 0;
  for (const s of sessions) {
    if (s.lastClassification) byUrgency[s.lastClassification.urgency]++;
    else unassessed++;
  }
  return { total_sessions: sessions.length, unassessed, by_urgency: byUrgency };
}

/** Transcript as plain text, newest `maxChars` kept. */
export function formatTranscript(session: Session, maxChars: number = 4000): string {
  const full = session.transcript.map(formatTranscriptEntry).join('\n');
  return full.length <= maxChars ? full : full.slice(-maxChars);
}
