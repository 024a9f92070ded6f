/**
 * Bounded waits used across the automation flow.
 *
 * Every component takes a `Timings` object so tests can run with zeros.
 */

export interface Timings {
  /** Wait after opening the login page. */
  loginSettleMs: number;
  /** Wait after submitting credentials before reading the page. */
  authSettleMs: number;
  /** Pause between keystroke batches on form fields. */
  typeSettleMs: number;
  /** Wait after clicking a navigation link or visiting a URL. */
  navigationSettleMs: number;
  /** Wait before looking for the entry form fields. */
  formLoadMs: number;
  /** Wait after clicking submit before classifying the outcome. */
  submitSettleMs: number;
  /** Window left for a person to reach the form by hand. */
  manualWindowMs: number;
  /** Per-candidate bound for required login and form fields. */
  fieldTimeoutMs: number;
  /** Per-candidate bound for optional controls and navigation links. */
  linkTimeoutMs: number;
  /** Poll interval while a candidate is pending. */
  pollIntervalMs: number;
}

export const DEFAULT_TIMINGS: Timings = {
  loginSettleMs: 3_000,
  authSettleMs: 3_000,
  typeSettleMs: 500,
  navigationSettleMs: 2_000,
  formLoadMs: 3_000,
  submitSettleMs: 3_000,
  manualWindowMs: 10_000,
  fieldTimeoutMs: 10_000,
  linkTimeoutMs: 3_000,
  pollIntervalMs: 250,
};

/** Every wait collapsed to zero; resolution then polls each candidate once. */
export const IMMEDIATE_TIMINGS: Timings = {
  loginSettleMs: 0,
  authSettleMs: 0,
  typeSettleMs: 0,
  navigationSettleMs: 0,
  formLoadMs: 0,
  submitSettleMs: 0,
  manualWindowMs: 0,
  fieldTimeoutMs: 0,
  linkTimeoutMs: 0,
  pollIntervalMs: 0,
};

export function resolveTimings(overrides?: Partial<Timings>): Timings {
  return { ...DEFAULT_TIMINGS, ...overrides };
}

export const sleep = (ms: number): Promise<void> =>
  ms > 0 ? new Promise((r) => setTimeout(r, ms)) : Promise.resolve();
