export { WebhookDispatcher } from './dispatcher.js';
export type { WebhookDispatcherOptions } from './dispatcher.js';
export { signPayload, serializeEvent, SIGNATURE_HEADER, EVENT_HEADER } from './signature.js';
