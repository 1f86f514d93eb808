/**
 * Periodic tick utility
 *
 * Encapsulates setInterval management with proper cleanup. Every periodic process
 * in the engine (session playback, intensity ramp, scheduler) runs on one of these,
 * so all of them share the single Node.js event loop and never interleave mid-tick.
 */

export interface Ticker {
  /** Whether the ticker is currently running */
  readonly isRunning: boolean;
  /** Interval between ticks in milliseconds */
  readonly intervalMs: number;
  /** Start ticking (no-op if already running) */
  start(): void;
  /** Stop ticking (no-op if already stopped) */
  stop(): void;
}

/**
 * Create a ticker.
 *
 * @param callback - Called on every tick. Receives the ticker so it can call
 *                   `ticker.stop()` to self-terminate.
 * @param onError - Receives anything the callback throws. The ticker keeps running.
 *
 * @example
 * ```ts
 * const ticker = createTicker(1000, (ticker) => {
 *   if (done()) {
 *     ticker.stop()
 *     return
 *   }
 *   advance()
 * }, (error) => logger.error('tick failed', error))
 *
 * ticker.start()
 * ```
 */
export function createTicker(
  intervalMs: number,
  callback: (ticker: Ticker) => void,
  onError: (error: unknown) => void,
): Ticker {
  let handle: ReturnType<typeof setInterval> | null = null;

  function tick(): void {
    try {
      callback(ticker);
    } catch (error) {
      onError(error);
    }
  }

  const ticker: Ticker = {
    get isRunning() {
      return handle !== null;
    },

    intervalMs,

    start() {
      if (handle !== null) return;
      handle = setInterval(tick, intervalMs);
    },

    stop() {
      if (handle === null) return;
      clearInterval(handle);
      handle = null;
    },
  };

  return ticker;
}
