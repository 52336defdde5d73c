// Explicit outcome of a call into an external collaborator.
// 'empty' = the source answered but had nothing usable; 'error' = the call threw.
export type Attempt<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'empty' }
  | { ok: false; reason: 'error'; error: unknown };

export function succeeded<T>(value: T): Attempt<T> {
  return { ok: true, value };
}

export function empty<T>(): Attempt<T> {
  return { ok: false, reason: 'empty' };
}

export function failed<T>(error: unknown): Attempt<T> {
  return { ok: false, reason: 'error', error };
}

/**
 * Runs `task` and folds both an undefined result and a thrown error into a
 * failed Attempt. Never rejects.
 */
export async function attempt<T>(task: () => Promise<T | undefined>): Promise<Attempt<T>> {
  try {
    const value = await task();
    return value === undefined ? empty<T>() : succeeded<T>(value);
  } catch (error) {
    return failed<T>(error);
  }
}

/** Short description of a failed Attempt for debug logs */
export function describeFailure<T>(result: Attempt<T>): string {
  if (result.ok) {
    return 'ok';
  }
  if (result.reason === 'empty') {
    return 'no data';
  }
  return result.error instanceof Error ? result.error.message : String(result.error);
}
