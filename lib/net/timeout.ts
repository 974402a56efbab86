/**
 * Raised by `withTimeout`; carries the same code c-ares uses for its own timeouts.
 */
export class TimeoutError extends Error {
  readonly code = 'ETIMEOUT';

  constructor(ms: number) {
    super(`timeout after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Shared timeout helper for promises.
 */
export function withTimeout<T>(p: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => reject(new TimeoutError(ms)), ms);
    p.then(
      (v) => { clearTimeout(t); resolve(v); },
      (e) => { clearTimeout(t); reject(e); },
    );
  });
}
