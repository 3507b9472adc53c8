export { loadConfig, type AppConfig, type Environment } from './config/environment.js';
export {
  ALLOWED_TRANSITIONS,
  DialogueStateMachine,
  canTransition,
  mergeFields,
  type DialogueStateMachineOptions,
} from './conversation/DialogueStateMachine.js';
export { ResponseComposer, formatTimestamp } from './conversation/ResponseComposer.js';
export { SchedulingAssistant, type SchedulingAssistantOptions } from './conversation/SchedulingAssistant.js';
export { selectSlot } from './conversation/slotSelection.js';
export { buildServices, createApp, startServer } from './server.js';
export { CalendarService, type CalendarEventsApi, type GoogleCalendarConfig } from './services/calendar/CalendarService.js';
export { generateSlots, isWithinWorkingHours } from './services/calendar/slots.js';
export {
  CollaboratorTimeoutError,
  withTimeout,
  type AvailabilityCollaborator,
  type SpeechCollaborator,
  type UnderstandingCollaborator,
} from './services/collaborators.js';
export { SessionLock } from './services/concurrency/SessionLock.js';
export { LLMService, type LLMCaller } from './services/llm/LLMService.js';
export { UnderstandingService, parseExtractedFields } from './services/llm/UnderstandingService.js';
export { ConversationWindow } from './services/memory/ConversationWindow.js';
export { SessionRegistry } from './services/session/SessionRegistry.js';
export { AVAILABLE_VOICES, VoiceService } from './services/voice/VoiceService.js';
export * from './types/index.js';
export { chronoFuzzyDateParser, type FuzzyDateParser } from './utils/fuzzyDate.js';
export { createLogger, logger, type Logger } from './utils/logger.js';
export { RESOLUTION_RULES, TimeExpressionResolver, type TimeExpression } from './utils/time.js';
