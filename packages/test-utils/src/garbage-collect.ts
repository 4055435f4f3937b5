function createGarbageCollect(): (() => Promise<void>) | undefined {
  const { gc } = globalThis;
  if (gc === undefined) {
    return undefined;
  }
  const collect: () => unknown = gc;
  return async () => {
    // WeakRef targets survive until the current job ends.
    await new Promise<void>((resolve) => setTimeout(() => resolve(), 0));
    collect();
  };
}

/**
 * Resolves after a full collection. Only defined when Node runs with
 * `--expose-gc`.
 */
export const garbageCollect = createGarbageCollect();
