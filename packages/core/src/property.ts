import type { Hookable } from './event.js';
import { type Hook, type RegistryOptions, SubscriberRegistry } from './registry.js';

export interface ReadonlyProperty<T> extends Hookable<T> {
  get(): T;
}

export interface PropertyOptions<T> extends RegistryOptions {
  /**
   * Opt into de-duplication. When it returns true for the stored and the
   * incoming value, the write is dropped and nobody is notified.
   */
  equals?: (previous: T, next: T) => boolean;
}

let writeExcluding: <T>(property: Property<T>, value: T, excluded: Hook | undefined) => T;

/**
 * Observable value. Every write notifies the hooks present when it started,
 * with the written value, before `set` returns.
 *
 * A hook that writes to the same property starts a nested pass which finishes
 * before the outer pass resumes, so later hooks of the outer pass still
 * receive the outer value while `get()` already returns the nested one.
 */
export class Property<T> implements ReadonlyProperty<T> {
  #value: T;
  #registry: SubscriberRegistry<[value: T]>;
  #equals?: (previous: T, next: T) => boolean;
  constructor(initialValue: T, options: PropertyOptions<T> = {}) {
    this.#value = initialValue;
    this.#registry = new SubscriberRegistry<[value: T]>(options);
    this.#equals = options.equals;
  }
  get hookCount(): number {
    return this.#registry.size;
  }
  get(): T {
    return this.#value;
  }
  set(value: T): undefined {
    this.#write(value, undefined);
  }
  update(mutator: (value: T) => T): T {
    return this.#write(mutator(this.#value), undefined);
  }
  /**
   * Subscribe to future writes. The current value is not replayed.
   */
  hook(callback: (value: T) => void): Hook {
    return this.#registry.register(callback);
  }
  bind(callback: (value: T) => void): Binding<T> {
    return new Binding(this, this.#registry.register(callback));
  }
  /**
   * Like `bind`, but writes made through the binding skip its own callback.
   */
  bindMut(callback: (value: T) => void): MutableBinding<T> {
    return new MutableBinding(this, this.#registry.register(callback));
  }
  dispose(): undefined {
    this.#registry.dispose();
  }
  [Symbol.dispose](): undefined {
    this.dispose();
  }
  #write(value: T, excluded: Hook | undefined): T {
    const equals = this.#equals;
    if (equals !== undefined && equals(this.#value, value)) {
      return this.#value;
    }
    this.#value = value;
    if (excluded === undefined) {
      this.#registry.notifyAll(value);
    } else {
      this.#registry.notifyExcept(excluded, value);
    }
    return value;
  }
  static {
    writeExcluding = function writeExcluding(property, value, excluded) {
      return property.#write(value, excluded);
    };
  }
}

export class Binding<T> {
  protected readonly property: Property<T>;
  protected readonly handle: Hook;
  constructor(property: Property<T>, handle: Hook) {
    this.property = property;
    this.handle = handle;
  }
  get isActive(): boolean {
    return this.handle.isActive;
  }
  get(): T {
    return this.property.get();
  }
  release(): undefined {
    this.handle.release();
  }
  /**
   * Keep the callback registered but stop tracking it. Writes made through a
   * leaked binding reach every hook, its own callback included.
   */
  leak(): undefined {
    this.handle.leak();
  }
  [Symbol.dispose](): undefined {
    this.release();
  }
}

export class MutableBinding<T> extends Binding<T> {
  set(value: T): undefined {
    writeExcluding(this.property, value, this.handle);
  }
  update(mutator: (value: T) => T): T {
    return writeExcluding(this.property, mutator(this.property.get()), this.handle);
  }
}
