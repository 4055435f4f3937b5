export type ErrorHandler = (cause: unknown) => void;

/**
 * Default reporter for registries that isolate callback failures.
 */
export const reportError: ErrorHandler = (cause) => {
  console.error(cause);
};
