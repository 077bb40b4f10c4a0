// ============================================================================
// TsuryPhone Bridge - Ring Pattern Parser
// Parses the compact ring pattern notation into the structure the
// `ring_pattern` action expects.
//
//   "2500,500,500,500x3"  -> durations [2500, 500, 500, 500], repeats 3
//   "1000,200,1000"       -> durations [1000, 200, 1000],      repeats 1
//   "500/5"               -> durations [500],                  repeats 5
// ============================================================================

import type { RingPattern } from '../../shared/types.js';
import { RingPatternError } from './errors.js';

/** Longest single ring or pause, in milliseconds */
export const MAX_DURATION_MS = 30_000;

/** Most times a pattern may repeat */
export const MAX_REPEATS = 100;

/** Separators that introduce the repeat count, in the order they are tried */
const REPEAT_SEPARATORS = ['x', '/'] as const;

const INTEGER_RE = /^[+-]?\d+$/;

/**
 * Parse a ring pattern string. Throws RingPatternError on any violation,
 * so callers can reject the request before contacting the device.
 */
export function parseRingPattern(text: string): RingPattern {
  const pattern = text.trim();
  if (!pattern) {
    throw new RingPatternError('Ring pattern is empty');
  }

  let body = pattern;
  let repeats = 1;

  for (const separator of REPEAT_SEPARATORS) {
    const at = pattern.lastIndexOf(separator);
    if (at === -1) continue;
    body = pattern.slice(0, at);
    repeats = parseInteger(pattern.slice(at + 1), 'repeat count');
    break;
  }

  if (repeats <= 0 || repeats > MAX_REPEATS) {
    throw new RingPatternError(`Repeat count must be between 1 and ${MAX_REPEATS}: ${repeats}`);
  }

  const durations: number[] = [];
  for (const token of body.split(',')) {
    // Stray commas ("500,,500") are tolerated
    if (!token.trim()) continue;
    const duration = parseInteger(token, 'duration');
    if (duration <= 0 || duration > MAX_DURATION_MS) {
      throw new RingPatternError(`Duration must be between 1 and ${MAX_DURATION_MS} ms: ${duration}`);
    }
    durations.push(duration);
  }

  if (durations.length === 0) {
    throw new RingPatternError(`No durations found in pattern: ${pattern}`);
  }

  // Repeated patterns alternate ring/pause, so they need whole pairs
  if (repeats > 1 && durations.length % 2 !== 0) {
    throw new RingPatternError(
      `Pattern with repeats must have an even number of durations (alternating ring/pause): ${pattern}`,
    );
  }

  return { durations, repeats };
}

function parseInteger(token: string, what: string): number {
  const trimmed = token.trim();
  if (!INTEGER_RE.test(trimmed)) {
    throw new RingPatternError(`Invalid ${what}: "${trimmed}"`);
  }
  return Number.parseInt(trimmed, 10);
}
