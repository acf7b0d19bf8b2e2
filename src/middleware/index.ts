/**
 * middleware/index.ts — Barrel export for the middleware layer.
 *
 * The rest of the codebase imports from `middleware` (one path) rather than
 * reaching into individual files.
 */

// ── Human behaviour ─────────────────────────────────────────
export { createHumanCursor, humanClick, humanType } from './humanBehavior';

// ── Pacing ──────────────────────────────────────────────────
export { RequestPacer } from './pacing';
export type { PacingOptions } from './pacing';
