/**
 * Core types for the daylog automation engine.
 *
 * LocatorCandidate and the marker sets are zod schemas because site
 * profiles can be loaded from JSON; run-time records are plain types.
 */

import { z } from 'zod';

// ── LocatorCandidate ─────────────────────────────────────────────────────
// One way of finding an element. Candidate lists are ordered: the resolver
// tries them front to back, so the most specific strategy goes first.

export const LocatorStrategySchema = z.enum(['id', 'name', 'css', 'tag', 'xpath']);
export type LocatorStrategy = z.infer<typeof LocatorStrategySchema>;

export const LocatorCandidateSchema = z.object({
  strategy: LocatorStrategySchema,
  selector: z.string().min(1),
  /** Require the element to be visible and enabled, not merely attached. */
  clickable: z.boolean().optional(),
});

export type LocatorCandidate = z.infer<typeof LocatorCandidateSchema>;

export const CandidateListSchema = z.array(LocatorCandidateSchema).min(1);

// ── Markers ──────────────────────────────────────────────────────────────

export const MarkerSetSchema = z.object({
  positive: z.array(z.string().min(1)),
  negative: z.array(z.string().min(1)).default([]),
});

export type MarkerSet = z.infer<typeof MarkerSetSchema>;

// ── Credentials & entries ────────────────────────────────────────────────

export interface Credentials {
  readonly url: string;
  readonly accountId: string;
  readonly secret: string;
}

export interface EntrySpec {
  /** ISO calendar date, YYYY-MM-DD. */
  date: string;
  content: string;
  category: string;
}

/** Derives the content for one day. The default trims the base text. */
export type ContentGenerator = (baseContent: string, dayIndex: number) => string;

export const passThroughContent: ContentGenerator = (baseContent) => baseContent.trim();

// ── Outcomes ─────────────────────────────────────────────────────────────

export type SubmissionOutcome =
  | { kind: 'success' }
  | { kind: 'explicit_failure'; reason: string }
  | { kind: 'ambiguous' };

/** Ambiguous pages carry no status message; they count as submitted. */
export function isCountedSuccess(outcome: SubmissionOutcome): boolean {
  return outcome.kind !== 'explicit_failure';
}

export type AuthOutcome = { ok: true } | { ok: false; reason: string };

export type NavigationStrategy = 'link' | 'frame' | 'direct_url' | 'manual';

export type NavigationOutcome =
  | { reached: true; strategy: NavigationStrategy }
  | { reached: false };

// ── Batch ────────────────────────────────────────────────────────────────

export type RunState = 'idle' | 'running' | 'stopping' | 'stopped' | 'completed';

export interface DayRecord {
  date: string;
  content: string;
  category: string;
  outcome: SubmissionOutcome;
}

export interface BatchResult {
  total: number;
  processed: number;
  succeeded: number;
  failed: number;
  state: RunState;
  details: DayRecord[];
}

export type ProgressSink = (processed: number, total: number, succeeded: number, failed: number) => void;

export interface ProgressEvent {
  processed: number;
  total: number;
  succeeded: number;
  failed: number;
}
