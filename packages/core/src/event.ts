import { type Hook, type RegistryOptions, SubscriberRegistry } from './registry.js';

export interface Hookable<T> {
  hook(callback: (value: T) => void): Hook;
}

export type EventOptions = RegistryOptions;

/**
 * Synchronous notification with a payload. Nothing is retained between emits.
 */
export class Event<T = undefined> implements Hookable<T> {
  #registry: SubscriberRegistry<[payload: T]>;
  constructor(options?: EventOptions) {
    this.#registry = new SubscriberRegistry<[payload: T]>(options);
  }
  get hookCount(): number {
    return this.#registry.size;
  }
  hook(callback: (payload: T) => void): Hook {
    return this.#registry.register(callback);
  }
  emit(payload: T): undefined {
    this.#registry.notifyAll(payload);
  }
  dispose(): undefined {
    this.#registry.dispose();
  }
  [Symbol.dispose](): undefined {
    this.dispose();
  }
}
