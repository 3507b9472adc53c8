/**
 * DialogueStateMachine
 *
 * One turn in, one outcome out. Each state has a handler; handlers read the
 * merged meeting request, consult the resolver and the availability
 * collaborator, and return the next state plus the text to send.
 *
 * Collaborator failures arrive as `CollaboratorResult` values and map to a
 * user-facing apology. Only a failed booking is terminal.
 */

import { addDays, addHours } from 'date-fns';
import type { AvailabilityCollaborator } from '../services/collaborators.js';
import { withTimeout } from '../services/collaborators.js';
import {
  ConversationState,
  TERMINAL_STATES,
  type CollaboratorResult,
  type ConversationContext,
  type ExtractedFields,
  type MeetingRequest,
  type ReferenceEvent,
  type TurnOutcome,
  type Understanding,
  type WorkingHoursConfig,
} from '../types/index.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { chronoFuzzyDateParser } from '../utils/fuzzyDate.js';
import { RESOLUTION_RULES, TimeExpressionResolver } from '../utils/time.js';
import { ResponseComposer } from './ResponseComposer.js';
import { selectSlot } from './slotSelection.js';

/** Slots shown to the user per availability check */
export const MAX_PRESENTED_SLOTS = 3;

/** Search window length, from the requested start */
export const AVAILABILITY_WINDOW_DAYS = 7;

export const DEFAULT_MEETING_TITLE = 'Meeting';

/**
 * Every move a handler may make. Each state may loop on itself; COMPLETED
 * and ERROR have no way out except clearing the session.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<ConversationState, readonly ConversationState[]>> = {
  [ConversationState.INITIAL]: [
    ConversationState.INITIAL,
    ConversationState.COLLECTING_DURATION,
    ConversationState.COLLECTING_TIME_PREFERENCE,
  ],
  [ConversationState.COLLECTING_DURATION]: [
    ConversationState.COLLECTING_DURATION,
    ConversationState.COLLECTING_TIME_PREFERENCE,
  ],
  [ConversationState.COLLECTING_TIME_PREFERENCE]: [
    ConversationState.COLLECTING_TIME_PREFERENCE,
    ConversationState.CHECKING_AVAILABILITY,
  ],
  [ConversationState.CHECKING_AVAILABILITY]: [
    ConversationState.CHECKING_AVAILABILITY,
    ConversationState.CONFIRMING_SLOT,
    ConversationState.COLLECTING_TIME_PREFERENCE,
    ConversationState.COLLECTING_DURATION,
  ],
  [ConversationState.CONFIRMING_SLOT]: [ConversationState.CONFIRMING_SLOT, ConversationState.SCHEDULING],
  [ConversationState.SCHEDULING]: [
    ConversationState.SCHEDULING,
    ConversationState.COMPLETED,
    ConversationState.ERROR,
    ConversationState.COLLECTING_TIME_PREFERENCE,
  ],
  [ConversationState.COMPLETED]: [ConversationState.COMPLETED],
  [ConversationState.ERROR]: [ConversationState.ERROR],
};

export function canTransition(from: ConversationState, to: ConversationState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

interface Turn {
  context: ConversationContext;
  request: MeetingRequest;
  rawText: string;
  reply: string;
  /** Fields extracted from this turn only */
  fields: ExtractedFields;
  now: Date;
}

type StateHandler = (turn: Turn) => Promise<TurnOutcome>;

export interface DialogueStateMachineOptions {
  availability: AvailabilityCollaborator;
  workingHours: WorkingHoursConfig;
  resolver?: TimeExpressionResolver;
  composer?: ResponseComposer;
  /** Hard limit per calendar call */
  timeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export class DialogueStateMachine {
  private readonly availability: AvailabilityCollaborator;
  private readonly workingHours: WorkingHoursConfig;
  private readonly resolver: TimeExpressionResolver;
  private readonly composer: ResponseComposer;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly handlers: Record<ConversationState, StateHandler> = {
    [ConversationState.INITIAL]: turn => this.collectDuration(turn),
    [ConversationState.COLLECTING_DURATION]: turn => this.collectDuration(turn),
    [ConversationState.COLLECTING_TIME_PREFERENCE]: turn => this.collectTimePreference(turn),
    [ConversationState.CHECKING_AVAILABILITY]: turn => this.checkAvailability(turn),
    [ConversationState.CONFIRMING_SLOT]: turn => this.confirmSlot(turn),
    [ConversationState.SCHEDULING]: turn => this.schedule(turn),
    [ConversationState.COMPLETED]: turn => this.terminal(turn),
    [ConversationState.ERROR]: turn => this.terminal(turn),
  };

  constructor(options: DialogueStateMachineOptions) {
    this.availability = options.availability;
    this.workingHours = options.workingHours;
    this.resolver =
      options.resolver ?? new TimeExpressionResolver(chronoFuzzyDateParser, RESOLUTION_RULES, options.workingHours.timezone);
    this.composer = options.composer ?? new ResponseComposer(options.workingHours.timezone);
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Process one user turn and move `context` to the next state.
   * History is left to the caller.
   */
  async processTurn(
    context: ConversationContext,
    rawText: string,
    understanding: CollaboratorResult<Understanding>
  ): Promise<TurnOutcome> {
    context.lastUserInput = rawText;
    const from = context.state;

    let outcome: TurnOutcome;
    if (TERMINAL_STATES.has(from)) {
      outcome = await this.terminal(this.buildTurn(context, rawText, '', {}));
    } else if (!understanding.success) {
      this.logger.warn(`⚠️ Understanding unavailable for ${context.sessionId}: ${understanding.error}`);
      outcome = {
        response: this.composer.understandingFailed(),
        nextState: from,
        requiresClarification: true,
      };
    } else {
      const { reply, fields } = understanding.data;
      mergeFields(context, fields);
      outcome = await this.handlers[from](this.buildTurn(context, rawText, reply, fields));
    }

    if (!canTransition(from, outcome.nextState)) {
      this.logger.error(`❌ Refusing transition ${from} -> ${outcome.nextState} for ${context.sessionId}`);
      return {
        response: this.composer.understandingFailed(),
        nextState: from,
        requiresClarification: true,
      };
    }

    if (from !== outcome.nextState) {
      this.logger.info(`🔄 ${context.sessionId}: ${from} -> ${outcome.nextState}`);
    }
    context.state = outcome.nextState;
    return outcome;
  }

  private buildTurn(context: ConversationContext, rawText: string, reply: string, fields: ExtractedFields): Turn {
    if (!context.meetingRequest) {
      context.meetingRequest = {};
    }
    return { context, request: context.meetingRequest, rawText, reply, fields, now: this.now() };
  }

  // ==========================================================================
  // STATE HANDLERS
  // ==========================================================================

  private async collectDuration({ request, reply }: Turn): Promise<TurnOutcome> {
    if (request.durationMinutes) {
      return {
        response: reply || this.composer.askTimePreference(),
        nextState: ConversationState.COLLECTING_TIME_PREFERENCE,
        requiresClarification: false,
      };
    }
    return {
      response: reply || this.composer.askDuration(),
      nextState: ConversationState.COLLECTING_DURATION,
      requiresClarification: true,
    };
  }

  private async collectTimePreference({ request, rawText, reply, fields, now }: Turn): Promise<TurnOutcome> {
    const referenceEvents = await this.loadReferenceEvents(now);
    const expression = this.resolver.parse(rawText, referenceEvents, now);
    const resolved = this.resolver.resolve(expression, now) ?? fields.specificTime ?? null;

    if (!resolved) {
      this.logger.debug(`🕐 No concrete time in "${rawText}" (confidence ${expression.confidence.toFixed(1)})`);
      return {
        response: reply || this.composer.askTimePreference(),
        nextState: ConversationState.COLLECTING_TIME_PREFERENCE,
        requiresClarification: true,
      };
    }

    this.logger.info(
      `🕐 Resolved "${rawText}" to ${resolved.toISOString()} via ${this.resolver.matchedRule(expression, now) ?? 'extracted_fields'}`
    );
    request.specificTime = resolved;
    return {
      response: reply || this.composer.timeNoted(resolved),
      nextState: ConversationState.CHECKING_AVAILABILITY,
      requiresClarification: false,
    };
  }

  private async checkAvailability({ context, request, now }: Turn): Promise<TurnOutcome> {
    const durationMinutes = request.durationMinutes;
    if (!durationMinutes) {
      return {
        response: this.composer.askDuration(),
        nextState: ConversationState.COLLECTING_DURATION,
        requiresClarification: true,
      };
    }

    const windowStart = request.specificTime ?? addHours(now, 1);
    const windowEnd = addDays(windowStart, AVAILABILITY_WINDOW_DAYS);

    const result = await withTimeout(
      'findSlots',
      this.timeoutMs,
      () => this.availability.findSlots(windowStart, windowEnd, durationMinutes, this.workingHours),
      this.logger
    );
    if (!result.success) {
      return {
        response: this.composer.availabilityFailed(),
        nextState: ConversationState.CHECKING_AVAILABILITY,
        requiresClarification: true,
      };
    }

    const presented = result.data.filter(slot => slot.isAvailable).slice(0, MAX_PRESENTED_SLOTS);
    context.currentAvailableSlots = presented;

    if (presented.length === 0) {
      const alternatives = request.specificTime ? this.resolver.suggestAlternatives(request.specificTime, now) : [];
      return {
        response: this.composer.noAvailability(alternatives),
        nextState: ConversationState.COLLECTING_TIME_PREFERENCE,
        requiresClarification: true,
      };
    }

    return {
      response: this.composer.slotOptions(presented),
      nextState: ConversationState.CONFIRMING_SLOT,
      suggestedActions: this.composer.optionActions(presented.length),
      requiresClarification: false,
    };
  }

  private async confirmSlot({ context, request, rawText }: Turn): Promise<TurnOutcome> {
    const selected = selectSlot(rawText, context.currentAvailableSlots, this.workingHours.timezone);

    if (!selected) {
      return {
        response: this.composer.selectionNotUnderstood(),
        nextState: ConversationState.CONFIRMING_SLOT,
        suggestedActions: this.composer.optionActions(context.currentAvailableSlots.length),
        requiresClarification: true,
      };
    }

    request.specificTime = selected.start;
    context.currentAvailableSlots = [];
    return {
      response: this.composer.slotConfirmation(request.durationMinutes, selected.start),
      nextState: ConversationState.SCHEDULING,
      requiresClarification: false,
    };
  }

  private async schedule({ request }: Turn): Promise<TurnOutcome> {
    if (!request.specificTime) {
      return {
        response: this.composer.missingSpecificTime(),
        nextState: ConversationState.COLLECTING_TIME_PREFERENCE,
        requiresClarification: true,
      };
    }

    const title = request.title ?? DEFAULT_MEETING_TITLE;
    const result = await withTimeout(
      'createEvent',
      this.timeoutMs,
      () => this.availability.createEvent(request, title),
      this.logger
    );

    if (!result.success || !result.data) {
      this.logger.error(`❌ Booking failed for "${title}"`);
      return {
        response: this.composer.schedulingFailed(),
        nextState: ConversationState.ERROR,
        requiresClarification: false,
      };
    }

    return {
      response: this.composer.scheduled(result.data.start),
      nextState: ConversationState.COMPLETED,
      requiresClarification: false,
    };
  }

  private async terminal({ context }: Turn): Promise<TurnOutcome> {
    return {
      response: this.composer.terminalNotice(context.state),
      nextState: context.state,
      requiresClarification: false,
    };
  }

  /** Upcoming calendar events that "before/after X" can anchor to. */
  private async loadReferenceEvents(now: Date): Promise<ReferenceEvent[]> {
    const source = this.availability;
    if (!source.listEvents) return [];

    const listEvents = source.listEvents.bind(source);
    const result = await withTimeout(
      'listEvents',
      this.timeoutMs,
      () => listEvents(now, addDays(now, AVAILABILITY_WINDOW_DAYS)),
      this.logger
    );
    return result.success ? result.data : [];
  }
}

/**
 * Last write wins per field; absent fields keep what was already known.
 */
export function mergeFields(context: ConversationContext, fields: ExtractedFields): MeetingRequest {
  const request: MeetingRequest = context.meetingRequest ?? {};

  if (fields.durationMinutes !== undefined) request.durationMinutes = fields.durationMinutes;
  if (fields.preferredDate !== undefined) request.preferredDate = fields.preferredDate;
  if (fields.preferredTimeRange !== undefined) request.preferredTimeRange = fields.preferredTimeRange;
  if (fields.specificTime !== undefined) request.specificTime = fields.specificTime;
  if (fields.title !== undefined) request.title = fields.title;
  if (fields.description !== undefined) request.description = fields.description;
  if (fields.attendees !== undefined) request.attendees = fields.attendees;

  context.meetingRequest = request;
  return request;
}
