/**
 * Outcome of a request that may be rejected without it being an error,
 * e.g. starting a session while another one is running.
 */
export interface Result<T, E extends string = string> {
  success: boolean;
  result?: T;
  error?: E;
}

export function ok<T>(result: T): Result<T, never> {
  return { success: true, result };
}

export function rejected<E extends string>(error: E): Result<never, E> {
  return { success: false, error };
}
