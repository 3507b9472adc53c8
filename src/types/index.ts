/**
 * Shared types for the scheduling assistant.
 */

import type { ConversationWindow } from '../services/memory/ConversationWindow.js';

// ============================================================================
// CONVERSATION STATE
// ============================================================================

export const ConversationState = {
  INITIAL: 'initial',
  COLLECTING_DURATION: 'collecting_duration',
  COLLECTING_TIME_PREFERENCE: 'collecting_time_preference',
  CHECKING_AVAILABILITY: 'checking_availability',
  CONFIRMING_SLOT: 'confirming_slot',
  SCHEDULING: 'scheduling',
  COMPLETED: 'completed',
  ERROR: 'error',
} as const;

export type ConversationState = (typeof ConversationState)[keyof typeof ConversationState];

export const CONVERSATION_STATES: readonly ConversationState[] = Object.values(ConversationState);

export const TERMINAL_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>([
  ConversationState.COMPLETED,
  ConversationState.ERROR,
]);

// ============================================================================
// MEETING DATA
// ============================================================================

export type TimeRangeLabel = 'morning' | 'afternoon' | 'evening' | 'night';

export interface MeetingRequest {
  durationMinutes?: number;
  preferredDate?: Date;
  preferredTimeRange?: TimeRangeLabel;
  specificTime?: Date;
  title?: string;
  description?: string;
  attendees?: string[];
}

/**
 * Sparse field mapping produced by the language-understanding step.
 * Dates arrive already parsed; malformed values never make it this far.
 */
export type ExtractedFields = Partial<MeetingRequest>;

export type TimeSlot = Readonly<{
  start: Date;
  end: Date;
  isAvailable: boolean;
  conflictReason?: string;
}>;

/** An existing calendar entry used as an anchor ("before my flight"). */
export interface ReferenceEvent {
  id?: string;
  title: string;
  start: Date;
  end: Date;
}

export interface CreatedEvent {
  id: string;
  title: string;
  start: Date;
  end: Date;
  description?: string;
  attendees?: string[];
  htmlLink?: string;
}

export interface WorkingHoursConfig {
  timezone: string;
  /** Inclusive start hour, local to `timezone` */
  startHour: number;
  /** Exclusive end hour */
  endHour: number;
  /** 0 = Sunday ... 6 = Saturday */
  workingDays: number[];
}

export type VoiceId = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

export interface VoiceConfig {
  voiceId: VoiceId;
  speed: number;
}

// ============================================================================
// CONVERSATION CONTEXT
// ============================================================================

export type MessageRole = 'user' | 'assistant';

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp: number;
}

export interface ConversationContext {
  sessionId: string;
  state: ConversationState;
  meetingRequest?: MeetingRequest;
  history: ConversationWindow;
  currentAvailableSlots: TimeSlot[];
  lastUserInput?: string;
  createdAt: number;
  updatedAt: number;
}

/** Read-only view handed to collaborators and the HTTP layer. */
export interface ContextSnapshot {
  sessionId: string;
  state: ConversationState;
  meetingRequest?: MeetingRequest;
  history: ConversationMessage[];
  currentAvailableSlots: TimeSlot[];
  lastUserInput?: string;
}

// ============================================================================
// COLLABORATOR RESULTS
// ============================================================================

export type CollaboratorResult<T> =
  | { success: true; data: T }
  | { success: false; error: string; timedOut?: boolean };

export interface Understanding {
  reply: string;
  fields: ExtractedFields;
}

// ============================================================================
// TURN I/O
// ============================================================================

export interface TurnOutcome {
  response: string;
  nextState: ConversationState;
  suggestedActions?: string[];
  requiresClarification: boolean;
}

export interface MessageInput {
  sessionId: string;
  message?: string;
  /** Raw audio for voice turns */
  audio?: Buffer;
  isVoice?: boolean;
}

export interface MessageResponse {
  response: string;
  /** Base64 audio, only for voice turns */
  audioResponse?: string;
  conversationState: ConversationState;
  suggestedActions?: string[];
  requiresClarification: boolean;
}
