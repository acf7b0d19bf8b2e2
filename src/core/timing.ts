/**
 * timing.ts — Sleep, jitter and age helpers shared by every layer.
 */

import { Duration } from 'luxon';

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Uniform random integer in [min, max]. */
export function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

/** Render an age for log lines: 5_400_000 → "1h 30m". */
export function formatAge(ms: number): string {
  return Duration.fromMillis(Math.max(0, ms)).toFormat("h'h' m'm'");
}

export const HOUR_MS = 60 * 60 * 1000;
