import type { ErrorHandler } from './shared.js';

export type Callback<TArgs extends unknown[]> = (...args: TArgs) => void;

export interface RegistryOptions {
  /**
   * When set, a throwing callback is reported here and the pass continues.
   * Without it the first failure aborts the pass and propagates.
   */
  onError?: ErrorHandler;
}

interface Registration {
  readonly owner: object;
  readonly active: boolean;
  detach(): undefined;
}

let unlink: <TArgs extends unknown[]>(
  registry: SubscriberRegistry<TArgs>,
  sub: Subscription<TArgs>
) => undefined;
let createHook: (registration: Registration | undefined) => Hook;
let registrationOf: (hook: Hook) => Registration | undefined;

class Subscription<TArgs extends unknown[]> implements Registration {
  // undefined once released
  callback: Callback<TArgs> | undefined;
  next: Subscription<TArgs> | undefined;
  prev: Subscription<TArgs> | undefined;
  readonly owner: SubscriberRegistry<TArgs>;
  readonly id: number;
  constructor(
    owner: SubscriberRegistry<TArgs>,
    id: number,
    callback: Callback<TArgs>,
    prev: Subscription<TArgs> | undefined
  ) {
    this.owner = owner;
    this.id = id;
    this.callback = callback;
    this.prev = prev;
  }
  get active(): boolean {
    return this.callback !== undefined;
  }
  detach(): undefined {
    unlink(this.owner, this);
  }
}

/**
 * Token for one registration. Release it explicitly, or scope it with `using`.
 *
 * The token only holds its registration weakly: once the registry is
 * unreachable, an outstanding hook does not keep it or its callbacks alive,
 * and reports itself inactive after collection.
 */
export class Hook {
  #registration?: WeakRef<Registration>;
  private constructor() {}
  get isActive(): boolean {
    return this.#registration?.deref()?.active === true;
  }
  release(): undefined {
    const registration = this.#registration?.deref();
    this.#registration = undefined;
    registration?.detach();
  }
  /**
   * Detach the token while leaving the callback registered for the lifetime of
   * the registry.
   */
  leak(): undefined {
    this.#registration = undefined;
  }
  [Symbol.dispose](): undefined {
    this.release();
  }
  static {
    createHook = function createHook(registration) {
      const hook = new Hook();
      hook.#registration = registration && new WeakRef(registration);
      return hook;
    };
    registrationOf = function registrationOf(hook) {
      return hook.#registration?.deref();
    };
  }
}

/**
 * Ordered set of callbacks. Passes only visit callbacks registered before the
 * pass started, and skip any released before their turn.
 */
export class SubscriberRegistry<TArgs extends unknown[]> {
  #head?: Subscription<TArgs>;
  #tail?: Subscription<TArgs>;
  #nextId = 0;
  #size = 0;
  #disposed = false;
  #onError?: ErrorHandler;
  constructor(options: RegistryOptions = {}) {
    this.#onError = options.onError;
  }
  get size(): number {
    return this.#size;
  }
  get isDisposed(): boolean {
    return this.#disposed;
  }
  register(callback: Callback<TArgs>): Hook {
    if (this.#disposed) {
      return createHook(undefined);
    }
    const tail = this.#tail;
    const sub = new Subscription(this, this.#nextId++, callback, tail);
    if (tail === undefined) {
      this.#head = sub;
    } else {
      tail.next = sub;
    }
    this.#tail = sub;
    this.#size++;
    return createHook(sub);
  }
  unregister(hook: Hook): undefined {
    if (registrationOf(hook)?.owner === this) {
      hook.release();
    }
  }
  notifyAll(...args: TArgs): undefined {
    this.#notify(undefined, args);
  }
  notifyExcept(excluded: Hook, ...args: TArgs): undefined {
    this.#notify(registrationOf(excluded), args);
  }
  dispose(): undefined {
    if (this.#disposed) {
      return;
    }
    this.#disposed = true;
    let sub = this.#head;
    while (sub !== undefined) {
      // Links stay intact so a pass in progress can walk past and stop.
      sub.callback = undefined;
      sub = sub.next;
    }
    this.#head = undefined;
    this.#tail = undefined;
    this.#size = 0;
  }
  [Symbol.dispose](): undefined {
    this.dispose();
  }
  #notify(excluded: Registration | undefined, args: TArgs): undefined {
    const end = this.#nextId;
    const onError = this.#onError;
    let sub = this.#head;
    while (sub !== undefined && sub.id < end) {
      const { callback } = sub;
      if (callback !== undefined && sub !== excluded) {
        if (onError === undefined) {
          callback(...args);
        } else {
          try {
            callback(...args);
          } catch (err) {
            onError(err);
          }
        }
      }
      sub = sub.next;
    }
  }
  static {
    unlink = function unlink(registry, sub) {
      if (sub.callback === undefined) {
        return;
      }
      sub.callback = undefined;
      const { prev, next } = sub;
      if (prev === undefined) {
        registry.#head = next;
      } else {
        prev.next = next;
      }
      if (next === undefined) {
        registry.#tail = prev;
      } else {
        next.prev = prev;
      }
      registry.#size--;
    };
  }
}
