import { v4 as uuidv4 } from 'uuid';
import { config } from '../config.js';
import { InvalidTransitionError } from '../errors.js';
import { assessPediatric, normalizeAge } from './pediatricService.js';
import { resolveEmergencyNumber } from './recommendationService.js';
import { defaultRuleTable, matchTier } from './ruleTable.js';
import type { RuleTable } from './ruleTable.js';
import { correctTranscription, countWords, normalizeText } from './textNormalizer.js';
import { classifySymptoms, isEmergency } from './triageService.js';
import { URGENCY_ORDER } from '../types.js';
import type {
  BotEntry,
  ClassificationResult,
  ConversationState,
  MessageChannel,
  Session,
  StateTransition,
  TranscriptEntry,
  UrgencyLevel,
} from '../types.js';

const TRANSITIONS: Record<ConversationState, readonly ConversationState[]> = {
  greeting: ['collecting_symptoms'],
  collecting_symptoms: ['awaiting_clarification', 'classifying'],
  awaiting_clarification: ['collecting_symptoms'],
  classifying: ['presenting_result'],
  presenting_result: ['follow_up'],
  follow_up: ['collecting_symptoms'],
};

/** Reset is an external command and may arrive in any state. */
export function canTransition(from: ConversationState, to: ConversationState): boolean {
  return to === 'greeting' || TRANSITIONS[from].includes(to);
}

const URGENCY_LABELS: Record<UrgencyLevel, string> = {
  emergency: 'Emergency',
  urgent: 'Urgent',
  outpatient: 'Outpatient',
  self_care: 'Self-Care',
};

const greetingMessages = (emergencyNumber: string) => [
  "Hello! I'm your healthcare triage assistant. I'm here to help assess your symptoms and guide you to appropriate care.",
  "Please describe your symptoms or health concerns in your own words. For example: 'I have a headache and feel tired' or 'My child has fever and cough'.",
  `Important: If this is a life-threatening emergency, please call emergency services (${emergencyNumber}) immediately.`,
];

const ASK_FOR_SYMPTOMS = 'Please describe your symptoms so I can help you find the right care.';
const CLARIFY_PROMPT =
  'Could you tell me a little more? For example: what symptoms you have, how long you have had them, and how severe they feel.';
const SYMPTOM_ACKNOWLEDGE = 'Thank you for sharing your symptoms. Let me assess this information.';
const FOLLOW_UP_QUESTION =
  'Do you have any questions about this assessment, or would you like to discuss any other symptoms?';

const FOLLOW_UP_EXPLANATION =
  'Based on the symptoms you described, my assessment considers several factors including severity, duration, and potential red flags for emergency conditions.';

const TIER_EXPLANATIONS: Record<UrgencyLevel, string> = {
  emergency: 'Your symptoms matched emergency warning signs that require immediate medical attention for your safety.',
  urgent: 'Your symptoms suggest a condition that should be evaluated promptly to prevent complications.',
  outpatient: 'Your symptoms appear to be manageable with appropriate care and monitoring.',
  self_care: 'Your symptoms appear to be manageable with appropriate care and monitoring.',
};

const GOODBYE_MESSAGES = [
  "You're welcome! Remember to seek medical attention if your symptoms worsen or you develop new concerning symptoms.",
  "Take care, and don't hesitate to use this service again if needed. Stay safe!",
];

// Follow-up remarks that are not a symptom report. Only consulted when the message matches no rule.
const QUESTION_PATTERN = /\b(why|how|what|when|should i|can i)\b/;
const CLOSING_PATTERN = /\b(thanks?|bye|goodbye|no more|that's all|that is all)\b/;

const HELPFUL_RESOURCES: Record<UrgencyLevel, (emergencyNumber: string) => string> = {
  emergency: (n) => `Emergency contacts: Call ${n} immediately.`,
  urgent: () =>
    'Find urgent care centers: search for "urgent care near me" or contact your doctor\'s office.',
  outpatient: () =>
    'Telemedicine options: Many healthcare providers offer video consultations. Contact your insurance provider for covered options.',
  self_care: () =>
    "Health information: Reliable sources include CDC.gov, Mayo Clinic, or your healthcare provider's patient portal.",
};

export interface ConversationOptions {
  rules?: RuleTable;
  /** Input with fewer words than this and no recognizable symptom triggers one clarifying question. */
  clarifyBelowWords?: number;
  maxClarifications?: number;
  now?: () => Date;
}

export interface UserMessageInput {
  text: string;
  channel?: MessageChannel;
  age?: unknown;
  countryCode?: string;
  degradedInput?: boolean;
}

export interface TurnResult {
  replies: BotEntry[];
  transitions: StateTransition[];
  state: ConversationState;
  classification?: ClassificationResult;
  isEmergency: boolean;
}

class Turn {
  readonly replies: BotEntry[] = [];
  readonly transitions: StateTransition[] = [];
  readonly at: string;

  constructor(readonly session: Session, now: Date) {
    this.at = now.toISOString();
  }

  moveTo(to: ConversationState): void {
    const from = this.session.currentState;
    if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
    this.session.currentState = to;
    this.transitions.push({ from, to, at: this.at });
  }

  say(text: string): void {
    this.reply({ id: uuidv4(), sender: 'bot', messageType: 'text', text, timestamp: this.at });
  }

  reply(entry: BotEntry): void {
    this.session.transcript.push(entry);
    this.replies.push(entry);
  }

  result(classification?: ClassificationResult): TurnResult {
    return {
      replies: this.replies,
      transitions: this.transitions,
      state: this.session.currentState,
      classification,
      isEmergency: classification ? isEmergency(classification) : false,
    };
  }
}

function resolveOptions(options: ConversationOptions) {
  return {
    rules: options.rules ?? defaultRuleTable,
    clarifyBelowWords: options.clarifyBelowWords ?? config.triage.clarifyBelowWords,
    maxClarifications: options.maxClarifications ?? 1,
    now: options.now ?? (() => new Date()),
  };
}

function hasAnyTrigger(normalized: string, session: Session, rules: RuleTable): boolean {
  if (assessPediatric(session.patientAge, normalized)) return true;
  return URGENCY_ORDER.some((tier) => matchTier(rules, normalized, tier).length > 0);
}

/** Answers a follow-up question or goodbye without re-assessing. False means treat it as more symptoms. */
function answerFollowUpRemark(turn: Turn, normalized: string, rules: RuleTable): boolean {
  const { session } = turn;
  if (!normalized || hasAnyTrigger(normalized, session, rules)) return false;
  if (QUESTION_PATTERN.test(normalized) && session.lastClassification) {
    turn.say(FOLLOW_UP_EXPLANATION);
    turn.say(TIER_EXPLANATIONS[session.lastClassification.urgency]);
    return true;
  }
  if (CLOSING_PATTERN.test(normalized)) {
    GOODBYE_MESSAGES.forEach((m) => turn.say(m));
    return true;
  }
  return false;
}

export function formatAssessment(result: ClassificationResult): string {
  const parts = [`Urgency level: ${URGENCY_LABELS[result.urgency]}`];
  parts.push('Recommendations:\n' + result.recommendations.map((r) => `• ${r}`).join('\n'));
  parts.push('Suggested next steps:\n' + result.nextSteps.map((s) => `• ${s}`).join('\n'));
  return parts.join('\n\n');
}

function presentResult(turn: Turn, result: ClassificationResult): void {
  turn.say(SYMPTOM_ACKNOWLEDGE);
  if (isEmergency(result)) {
    turn.reply({
      id: uuidv4(),
      sender: 'bot',
      messageType: 'emergency',
      emergencyNumber: result.emergencyNumber,
      text: [
        '🚨 MEDICAL EMERGENCY DETECTED 🚨',
        'Your symptoms indicate a potential medical emergency.',
        `Please call emergency services immediately (${result.emergencyNumber}) or go to the nearest emergency room.`,
      ].join('\n'),
      timestamp: turn.at,
    });
  }
  turn.reply({
    id: uuidv4(),
    sender: 'bot',
    messageType: 'assessment',
    urgency: result.urgency,
    text: formatAssessment(result),
    timestamp: turn.at,
  });
  turn.say(HELPFUL_RESOURCES[result.urgency](result.emergencyNumber));
  turn.say(FOLLOW_UP_QUESTION);
}

/** Posts the greeting into a freshly created session. */
export function openConversation(session: Session, options: ConversationOptions = {}): TurnResult {
  const turn = new Turn(session, resolveOptions(options).now());
  const { emergencyNumber } = resolveEmergencyNumber(session.countryCode);
  greetingMessages(emergencyNumber).forEach((m) => turn.say(m));
  return turn.result();
}

/**
 * Runs one user turn. The user message is appended before any transition and
 * bot replies after; the transcript order is the replay order.
 */
export function handleUserMessage(
  session: Session,
  input: UserMessageInput,
  options: ConversationOptions = {}
): TurnResult {
  const opts = resolveOptions(options);
  const turn = new Turn(session, opts.now());
  const channel = input.channel ?? 'text';
  const text = channel === 'voice' ? correctTranscription(input.text) : input.text.trim();

  session.transcript.push({ id: uuidv4(), sender: 'user', messageType: 'text', channel, text, timestamp: turn.at });
  session.lastActivityAt = turn.at;

  const age = normalizeAge(input.age);
  if (age !== undefined) session.patientAge = age;
  if (input.countryCode?.trim()) session.countryCode = input.countryCode.trim().toUpperCase();

  if (session.currentState === 'follow_up' && answerFollowUpRemark(turn, normalizeText(text), opts.rules)) {
    return turn.result();
  }

  if (session.currentState !== 'collecting_symptoms') turn.moveTo('collecting_symptoms');

  session.accumulatedSymptomText = [session.accumulatedSymptomText, text].filter(Boolean).join(' ');
  const normalized = normalizeText(session.accumulatedSymptomText);

  if (!normalized) {
    turn.say(ASK_FOR_SYMPTOMS);
    return turn.result();
  }

  if (
    session.clarificationCount < opts.maxClarifications &&
    countWords(normalized) < opts.clarifyBelowWords &&
    !hasAnyTrigger(normalized, session, opts.rules)
  ) {
    session.clarificationCount++;
    turn.moveTo('awaiting_clarification');
    turn.say(CLARIFY_PROMPT);
    return turn.result();
  }

  turn.moveTo('classifying');
  const classification = classifySymptoms(session.accumulatedSymptomText, {
    age: session.patientAge,
    countryCode: session.countryCode,
    rules: opts.rules,
    degradedInput: input.degradedInput,
    // Still nothing recognizable after asking: route to a clinician, not home care.
    unmatchedIsInsufficient: session.clarificationCount > 0,
  });
  session.lastClassification = classification;
  session.clarificationCount = 0;

  turn.moveTo('presenting_result');
  presentResult(turn, classification);
  turn.moveTo('follow_up');
  return turn.result(classification);
}

/** Explicit "new session" command: back to the greeting with a clean symptom slate. */
export function resetConversation(session: Session, options: ConversationOptions = {}): TurnResult {
  const turn = new Turn(session, resolveOptions(options).now());
  turn.moveTo('greeting');
  session.accumulatedSymptomText = '';
  session.lastClassification = undefined;
  session.patientAge = undefined;
  session.clarificationCount = 0;
  session.lastActivityAt = turn.at;
  const { emergencyNumber } = resolveEmergencyNumber(session.countryCode);
  greetingMessages(emergencyNumber).forEach((m) => turn.say(m));
  return turn.result();
}

/** Plain-text rendering of one transcript entry, e.g. for clinician review. */
export function formatTranscriptEntry(entry: TranscriptEntry): string {
  switch (entry.messageType) {
    case 'assessment':
      return `bot [assessment: ${entry.urgency}]: ${entry.text}`;
    case 'emergency':
      return `bot [EMERGENCY ${entry.emergencyNumber}]: ${entry.text}`;
    case 'text':
      return entry.sender === 'user'
        ? `user${entry.channel === 'voice' ? ' (voice)' : ''}: ${entry.text}`
        : `bot: ${entry.text}`;
    default: {
      const unreachable: never = entry;
      return unreachable;
    }
  }
}
