/**
 * Unit tests for duration formatting
 *
 * @see src/utils/duration.ts
 */

import { describe, it, expect } from 'vitest';
import { formatDuration } from '../../../src/utils/duration';

describe('formatDuration', () => {
  it('should show 0s for an empty duration', () => {
    expect(formatDuration(0n)).toBe('0s');
  });

  it('should keep the two largest units', () => {
    expect(formatDuration(1_250_000_000n)).toBe('1s250ms');
    expect(formatDuration(90_000_000_000n)).toBe('1m30s');
    expect(formatDuration(3_723_000_000_000n)).toBe('1h2m');
  });

  it('should skip zero units between non-zero ones', () => {
    expect(formatDuration(3_605_000_000_000n)).toBe('1h5s');
  });

  it('should format sub-millisecond durations', () => {
    expect(formatDuration(1_500n)).toBe('1us500ns');
    expect(formatDuration(7n)).toBe('7ns');
  });

  it('should show a single unit when the rest is zero', () => {
    expect(formatDuration(86_400_000_000_000n)).toBe('1d');
  });
});
