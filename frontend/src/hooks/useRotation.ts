import { useCallback, useEffect, useState } from 'react';

interface UseRotationOptions {
  intervalMs: number;
}

/**
 * Cycle an index through `count` slots on a fixed interval.
 *
 * Manual navigation only moves the index; the interval keeps its own
 * cadence and simply advances from wherever the index is on the next tick.
 */
export function useRotation(count: number, { intervalMs }: UseRotationOptions) {
  const [index, setIndex] = useState(0);

  const step = useCallback(
    (delta: number) => {
      if (count <= 0) return;
      setIndex((current) => (((current + delta) % count) + count) % count);
    },
    [count]
  );

  useEffect(() => {
    if (count <= 1) return;

    const timer = setInterval(() => step(1), intervalMs);

    return () => {
      clearInterval(timer);
    };
  }, [intervalMs, count, step]);

  const next = useCallback(() => step(1), [step]);
  const prev = useCallback(() => step(-1), [step]);

  return { index, next, prev, setIndex };
}
