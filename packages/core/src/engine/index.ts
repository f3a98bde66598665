export type { Subsystem } from './subsystem.js';
export { SubsystemRegistry } from './subsystem.js';
export { EventBus } from './event-bus.js';
export type { EventListener } from './event-bus.js';
