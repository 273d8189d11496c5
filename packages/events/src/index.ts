export type { ChatEvent, ChatEventKind, ChatEventMap } from './types.js';
export { EVENT_SIGNATURES, isEventKind } from './types.js';
export { chatEventSchema, parseEvent } from './contract.js';
export { EventDispatcher } from './dispatcher.js';
export type {
  DispatchFailure,
  DispatchReport,
  DispatchTarget,
  DispatcherOptions,
  EventRecord,
} from './dispatcher.js';
