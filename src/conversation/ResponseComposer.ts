/**
 * ResponseComposer
 *
 * Stateless templating for every message the dialogue produces on its own
 * (as opposed to the conversational reply from the understanding step).
 * All timestamps go through `formatTimestamp` so confirmation and completion
 * messages read the same way.
 */

import { format } from 'date-fns';
import { ConversationState, type TimeSlot } from '../types/index.js';
import { toWallClock } from '../utils/zonedTime.js';

export const TIMESTAMP_FORMAT = "EEEE, MMMM dd 'at' hh:mm a";

/** Rendered on the clock of `timezone`, or the host clock when omitted. */
export function formatTimestamp(date: Date, timezone?: string): string {
  return format(toWallClock(date, timezone), TIMESTAMP_FORMAT);
}

export class ResponseComposer {
  /** @param timezone - Calendar timezone every timestamp is shown in */
  constructor(private readonly timezone?: string) {}

  /** Quick replies matching the rendered option lines: "Option 1" ... "Option n". */
  optionActions(count: number): string[] {
    return Array.from({ length: count }, (_, index) => `Option ${index + 1}`);
  }

  slotOptions(slots: readonly TimeSlot[]): string {
    const lines = slots.map((slot, index) => `Option ${index + 1}: ${formatTimestamp(slot.start, this.timezone)}`);
    return `Great! I found some available times:\n${lines.join('\n')}\nWhich one works for you?`;
  }

  noAvailability(alternatives: readonly Date[] = []): string {
    const base =
      "I don't see any available slots in the next week. " +
      'Would you like to try a different time of day? How about scheduling for next week?';
    if (alternatives.length === 0) return base;

    const lines = alternatives.map(date => `- ${formatTimestamp(date, this.timezone)}`);
    return `${base}\nSome other times that might work:\n${lines.join('\n')}`;
  }

  slotConfirmation(durationMinutes: number | undefined, start: Date): string {
    const meeting = durationMinutes ? `${durationMinutes}-minute meeting` : 'meeting';
    return `Perfect! I'll schedule your ${meeting} for ${formatTimestamp(start, this.timezone)}. Is that correct?`;
  }

  selectionNotUnderstood(): string {
    return (
      "I didn't understand your choice. Please select one of the available options " +
      "or let me know if you'd like to see different times."
    );
  }

  scheduled(start: Date): string {
    return (
      `Excellent! I've successfully scheduled your meeting for ${formatTimestamp(start, this.timezone)}. ` +
      "You'll receive a calendar invitation shortly."
    );
  }

  schedulingFailed(): string {
    return (
      'I encountered an error while scheduling your meeting. ' +
      'Please try again or contact support if the issue persists.'
    );
  }

  missingSpecificTime(): string {
    return "I need to know when you'd like to schedule the meeting. Please provide a specific time.";
  }

  askDuration(): string {
    return 'How long should the meeting be? For example, 30 minutes or 1 hour.';
  }

  askTimePreference(): string {
    return 'When would you like to meet? You can say something like "tomorrow at 2 PM" or "next Tuesday morning".';
  }

  timeNoted(time: Date): string {
    return `Got it, ${formatTimestamp(time, this.timezone)}. I'll check the calendar for open slots around then.`;
  }

  understandingFailed(): string {
    return "Sorry, I'm having trouble understanding right now. Could you say that again?";
  }

  availabilityFailed(): string {
    return "Sorry, I couldn't reach the calendar just now. Please try again in a moment.";
  }

  didNotCatch(): string {
    return "I didn't catch that. Could you please try again?";
  }

  terminalNotice(state: ConversationState): string {
    if (state === ConversationState.COMPLETED) {
      return 'Your meeting is already scheduled. Clear this conversation to schedule another one.';
    }
    return 'Something went wrong with this booking. Please clear this conversation and start again.';
  }
}
