export { EventBroadcaster } from './event-broadcaster.js';
export type { ObserverSink } from './event-broadcaster.js';
