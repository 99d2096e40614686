/**
 * CarePath data models and API types.
 * Symptom text is sensitive: it lives in the session only and never reaches the audit log.
 */

export type UrgencyLevel = 'emergency' | 'urgent' | 'outpatient' | 'self_care';

/** Descending severity; index 0 is the most severe tier. */
export const URGENCY_ORDER: readonly UrgencyLevel[] = ['emergency', 'urgent', 'outpatient', 'self_care'];

export function isUrgencyLevel(value: unknown): value is UrgencyLevel {
  return URGENCY_ORDER.some((level) => level === value);
}

export interface TriggerRule {
  readonly category: string;     // e.g. "chest_pain"
  readonly tier: UrgencyLevel;
  readonly baseConfidence: number;
  readonly phrases: readonly string[]; // lowercase substrings
}

export interface MatchEvidence {
  readonly category: string;
  readonly tier: UrgencyLevel;
  readonly phrases: readonly string[]; // phrases found in the text
  readonly baseConfidence: number;
}

export interface ClassificationResult {
  readonly urgency: UrgencyLevel;
  readonly matchedCategories: readonly string[]; // detection order
  readonly confidence: number;
  readonly recommendations: readonly string[];
  readonly nextSteps: readonly string[];
  readonly evidence: readonly MatchEvidence[];
  readonly insufficientInformation: boolean;
  readonly countryCode: string;
  readonly emergencyNumber: string;
}

export type ConversationState =
  | 'greeting'
  | 'collecting_symptoms'
  | 'awaiting_clarification'
  | 'classifying'
  | 'presenting_result'
  | 'follow_up';

export type MessageChannel = 'text' | 'voice';

interface TranscriptEntryBase {
  id: string;
  text: string;
  timestamp: string;
}

export type TranscriptEntry =
  | (TranscriptEntryBase & { sender: 'user'; messageType: 'text'; channel: MessageChannel })
  | (TranscriptEntryBase & { sender: 'bot'; messageType: 'text' })
  | (TranscriptEntryBase & { sender: 'bot'; messageType: 'assessment'; urgency: UrgencyLevel })
  | (TranscriptEntryBase & { sender: 'bot'; messageType: 'emergency'; emergencyNumber: string });

export type BotEntry = Extract<TranscriptEntry, { sender: 'bot' }>;

export interface Session {
  sessionId: string;
  userId: string;
  createdAt: string;
  lastActivityAt: string;
  transcript: TranscriptEntry[];
  currentState: ConversationState;
  accumulatedSymptomText: string;
  lastClassification?: ClassificationResult;
  patientAge?: number;
  countryCode: string;
  clarificationCount: number;
}

export interface StateTransition {
  from: ConversationState;
  to: ConversationState;
  at: string;
}

/** Wire shape of a classification (snake_case, as exported). */
export interface TriageResultPayload {
  urgency: UrgencyLevel;
  matched_categories: string[];
  confidence: number;
  recommendations: string[];
  next_steps: string[];
  is_emergency: boolean;
  insufficient_information: boolean;
  country_code: string;
  emergency_number: string;
}

export interface TranscriptEntryPayload {
  id: string;
  sender: 'user' | 'bot';
  message: string;
  message_type: TranscriptEntry['messageType'];
  timestamp: string;
  channel?: MessageChannel;
  urgency?: UrgencyLevel;
  emergency_number?: string;
}

export interface SessionExport {
  session_id: string;
  user_id: string;
  created_at: string;
  symptoms: string;
  triage_result: TriageResultPayload | null;
  conversation: TranscriptEntryPayload[];
}
