/**
 * Timestamp source for versioned writes. Versions of one entity are ordered
 * by their ISO timestamp, so two operations must never share one.
 */
export type Clock = () => Date;

/**
 * Wall clock that never repeats or goes backwards within this process
 */
export function createMonotonicClock(now: Clock = () => new Date()): Clock {
  let last = 0;
  return () => {
    const current = now().getTime();
    last = current > last ? current : last + 1;
    return new Date(last);
  };
}
