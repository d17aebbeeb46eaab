import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { act, fireEvent, render, screen } from '@testing-library/react';
import { InfoPanel } from './InfoPanel';

describe('InfoPanel', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('rotates through the three panels', () => {
    render(<InfoPanel intervalMs={1000} />);
    expect(screen.getByRole('heading', { name: 'Feature Importance' })).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(screen.getByRole('heading', { name: 'Feature Analysis' })).toBeInTheDocument();
    expect(screen.getByText('9 Active')).toBeInTheDocument();
    expect(screen.getByText('12 Active')).toBeInTheDocument();
    expect(screen.getByText('3 Detected')).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(screen.getByRole('heading', { name: 'Predictive Insights' })).toBeInTheDocument();

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(screen.getByRole('heading', { name: 'Feature Importance' })).toBeInTheDocument();
  });

  it('jumps to a panel from its tab', () => {
    render(<InfoPanel intervalMs={1000} />);

    fireEvent.click(screen.getByRole('tab', { name: 'Predictive Insights' }));

    expect(screen.getByRole('tab', { name: 'Predictive Insights' })).toHaveAttribute('aria-selected', 'true');
    expect(screen.getByRole('heading', { name: 'Predictive Insights' })).toBeInTheDocument();
  });
});
