import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import { useRotation } from './useRotation';

describe('useRotation', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('advances on every interval and wraps around', () => {
    const { result } = renderHook(() => useRotation(3, { intervalMs: 1000 }));
    expect(result.current.index).toBe(0);

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(result.current.index).toBe(1);

    act(() => {
      vi.advanceTimersByTime(2000);
    });
    expect(result.current.index).toBe(0);
  });

  it('moves manually in both directions', () => {
    const { result } = renderHook(() => useRotation(3, { intervalMs: 1000 }));

    act(() => result.current.prev());
    expect(result.current.index).toBe(2);

    act(() => result.current.next());
    act(() => result.current.next());
    expect(result.current.index).toBe(1);
  });

  it('keeps its cadence after a manual step', () => {
    const { result } = renderHook(() => useRotation(3, { intervalMs: 1000 }));

    act(() => {
      vi.advanceTimersByTime(400);
    });
    act(() => result.current.next());
    expect(result.current.index).toBe(1);

    act(() => {
      vi.advanceTimersByTime(600);
    });
    expect(result.current.index).toBe(2);
  });

  it('does not start an interval for a single slot', () => {
    const { result } = renderHook(() => useRotation(1, { intervalMs: 1000 }));
    expect(vi.getTimerCount()).toBe(0);
    act(() => result.current.next());
    expect(result.current.index).toBe(0);
  });

  it('stops the interval on unmount', () => {
    const { unmount } = renderHook(() => useRotation(2, { intervalMs: 1000 }));
    expect(vi.getTimerCount()).toBe(1);
    unmount();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('stays at zero with nothing to rotate', () => {
    const { result } = renderHook(() => useRotation(0, { intervalMs: 1000 }));
    act(() => result.current.next());
    expect(result.current.index).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });
});
