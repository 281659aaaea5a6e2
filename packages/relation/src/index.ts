/**
 * @scrapelink/relation
 * Host boundary: relation data, notifications and in-process stand-ins
 */

export * from './types.js';
export { InMemoryRelationStore } from './memory-store.js';
export { StaticLocalUnit } from './local-unit.js';
export type { StaticLocalUnitOptions } from './local-unit.js';
export { RelationEventBus } from './event-bus.js';
export type { RelationEventBusEvents } from './event-bus.js';
