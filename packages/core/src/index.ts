export { Event } from './event.js';
export type { EventOptions, Hookable } from './event.js';
export { Binding, MutableBinding, Property } from './property.js';
export type { PropertyOptions, ReadonlyProperty } from './property.js';
export { Hook, SubscriberRegistry } from './registry.js';
export type { Callback, RegistryOptions } from './registry.js';
export { reportError } from './shared.js';
export type { ErrorHandler } from './shared.js';
