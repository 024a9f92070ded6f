/**
 * BatchDriver: Files one entry per day over a date range.
 *
 * Lifecycle: idle → running → completed, or running → stopping → stopped
 * on cancellation (stopped directly on a batch-fatal fault). Login and the
 * first navigation are the only fatal steps; every per-day fault is
 * recorded as a failed day and the loop moves on. The browser session is
 * closed on every exit path.
 */

import { randomUUID } from 'crypto';
import EventEmitter from 'eventemitter3';
import type { BrowserSession, SessionFactory } from '../browser/types';
import type { BatchRequest } from '../config/request';
import type { SiteProfile } from '../site/types';
import { DEFAULT_PROFILE } from '../site/defaultProfile';
import {
  isCountedSuccess,
  passThroughContent,
  type AuthOutcome,
  type BatchResult,
  type ContentGenerator,
  type Credentials,
  type DayRecord,
  type EntrySpec,
  type NavigationOutcome,
  type ProgressEvent,
  type ProgressSink,
  type RunState,
  type SubmissionOutcome,
} from './types';
import { generateDates } from './calendar';
import { AuthFailureError, NavigationFailureError, errorMessage } from './errors';
import { SessionController } from './SessionController';
import { PageNavigator } from './PageNavigator';
import { EntrySubmitter } from './EntrySubmitter';
import { LocatorResolver } from './LocatorResolver';
import { CancellationToken } from './CancellationToken';
import { resolveTimings, sleep, type Timings } from '../config/timing';
import { getLogger, type Logger } from '../monitoring/logger';

// ── Collaborator seams ──────────────────────────────────────────────────

export interface Authenticator {
  authenticate(credentials: Credentials): Promise<AuthOutcome>;
}

export interface FormNavigator {
  reachEntryForm(): Promise<NavigationOutcome>;
}

export interface Submitter {
  submit(entry: EntrySpec): Promise<SubmissionOutcome>;
}

export interface BatchComponents {
  authenticator: Authenticator;
  navigator: FormNavigator;
  submitter: Submitter;
}

/** `logger` is bound to the run and masks its secret. */
export type ComponentFactory = (
  session: BrowserSession,
  credentials: Credentials,
  logger: Logger,
) => BatchComponents;

// ── Events ───────────────────────────────────────────────────────────────

export interface BatchDriverEvents {
  progress: (event: ProgressEvent) => void;
  day: (record: DayRecord) => void;
  state: (state: RunState) => void;
}

// ── Options ──────────────────────────────────────────────────────────────

export interface BatchDriverOptions {
  openSession: SessionFactory;
  profile?: SiteProfile;
  timings?: Partial<Timings>;
  contentGenerator?: ContentGenerator;
  /** Builds login/navigation/submission on top of the opened session. */
  components?: ComponentFactory;
  /** Used for the inter-submission delay. */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface BatchRunInput {
  request: BatchRequest;
  onProgress?: ProgressSink;
  isCancelled?: () => boolean;
}

export class BatchDriver extends EventEmitter<BatchDriverEvents> {
  private openSession: SessionFactory;
  private profile: SiteProfile;
  private timings: Timings;
  private contentGenerator: ContentGenerator;
  private componentFactory: ComponentFactory;
  private wait: (ms: number) => Promise<void>;
  private logger: Logger;
  private state: RunState = 'idle';

  constructor(options: BatchDriverOptions) {
    super();
    this.openSession = options.openSession;
    this.profile = options.profile ?? DEFAULT_PROFILE;
    this.timings = resolveTimings(options.timings);
    this.contentGenerator = options.contentGenerator ?? passThroughContent;
    this.wait = options.sleep ?? sleep;
    this.logger = (options.logger ?? getLogger()).child({ component: 'batch' });
    this.componentFactory =
      options.components ?? ((session, credentials, logger) => this.defaultComponents(session, credentials, logger));
  }

  getState(): RunState {
    return this.state;
  }

  async run(input: BatchRunInput): Promise<BatchResult> {
    const current = this.getState();
    if (current !== 'idle') {
      throw new Error(`BatchDriver runs exactly once (current state: ${current})`);
    }

    const { request } = input;
    const credentials: Credentials = { url: request.url, accountId: request.accountId, secret: request.secret };
    const log = this.logger.child({ runId: randomUUID().slice(0, 8) }).withCredentials(credentials);
    const isCancelled = input.isCancelled ?? (() => false);
    const result: BatchResult = { total: 0, processed: 0, succeeded: 0, failed: 0, state: 'running', details: [] };

    this.setState('running');

    if (request.start > request.end) {
      log.error('Start date is after end date', { start: request.start, end: request.end });
      return this.finish(result, 'stopped');
    }

    let session: BrowserSession;
    try {
      session = await this.openSession();
    } catch (err) {
      log.error('Browser session could not be opened', { error: errorMessage(err) });
      this.setState('stopped');
      throw err;
    }

    try {
      const { authenticator, navigator, submitter } = this.componentFactory(session, credentials, log);

      const auth = await authenticator.authenticate(credentials);
      if (!auth.ok) {
        log.error('Batch aborted', { error: new AuthFailureError(auth.reason).message });
        return this.finish(result, 'stopped');
      }

      const navigation = await navigator.reachEntryForm();
      if (!navigation.reached) {
        log.error('Batch aborted', { error: new NavigationFailureError().message });
        return this.finish(result, 'stopped');
      }

      const dates = generateDates(request.start, request.end);
      result.total = dates.length;
      log.info('Starting daily entries', {
        days: dates.length,
        first: dates[0],
        last: dates[dates.length - 1],
        category: request.category,
      });

      let cancelled = false;
      for (let i = 0; i < dates.length; i++) {
        if (isCancelled()) {
          cancelled = true;
          this.setState('stopping');
          log.info('Run cancelled', { processed: result.processed, total: result.total });
          break;
        }

        const entry: EntrySpec = {
          date: dates[i],
          content: this.contentGenerator(request.content, i),
          category: request.category,
        };

        const outcome = await this.submitDay(submitter, entry, log);
        this.record(result, { ...entry, outcome });
        input.onProgress?.(result.processed, result.total, result.succeeded, result.failed);

        if (i < dates.length - 1) {
          log.debug('Waiting before next entry', { seconds: request.delaySeconds });
          await this.wait(request.delaySeconds * 1000);

          await this.returnToForm(navigator, entry.date, log);
        }
      }

      this.logSummary(result, log);
      return this.finish(result, cancelled ? 'stopped' : 'completed');
    } catch (err) {
      log.error('Batch aborted by unexpected fault', {
        error: errorMessage(err),
        processed: result.processed,
      });
      return this.finish(result, 'stopped');
    } finally {
      await this.closeSession(session, log);
    }
  }

  /** A fault inside one day becomes that day's failure; the batch goes on. */
  private async submitDay(submitter: Submitter, entry: EntrySpec, log: Logger): Promise<SubmissionOutcome> {
    try {
      return await submitter.submit(entry);
    } catch (err) {
      const reason = errorMessage(err);
      log.forDay(entry.date).error('Day failed with an unexpected fault', { error: reason });
      return { kind: 'explicit_failure', reason };
    }
  }

  /** The form is single-use. Failing to get a fresh one is logged; the next day still runs. */
  private async returnToForm(navigator: FormNavigator, after: string, log: Logger): Promise<void> {
    try {
      const again = await navigator.reachEntryForm();
      if (!again.reached) {
        log.warn('Could not return to a fresh entry form', { after });
      }
    } catch (err) {
      log.warn('Returning to the entry form failed', { after, error: errorMessage(err) });
    }
  }

  private record(result: BatchResult, record: DayRecord): void {
    result.details.push(record);
    result.processed++;
    if (isCountedSuccess(record.outcome)) {
      result.succeeded++;
    } else {
      result.failed++;
    }

    this.emit('day', record);
    this.emit('progress', {
      processed: result.processed,
      total: result.total,
      succeeded: result.succeeded,
      failed: result.failed,
    });
  }

  private finish(result: BatchResult, state: RunState): BatchResult {
    result.state = state;
    this.setState(state);
    return result;
  }

  private setState(state: RunState): void {
    this.state = state;
    this.emit('state', state);
  }

  private async closeSession(session: BrowserSession, log: Logger): Promise<void> {
    try {
      log.info('Closing browser');
      await session.close();
    } catch (err) {
      log.warn('Browser did not close cleanly', { error: errorMessage(err) });
    }
  }

  private logSummary(result: BatchResult, log: Logger): void {
    const rate = result.total > 0 ? Math.round((result.succeeded / result.total) * 1000) / 10 : 0;
    log.info('Batch finished', {
      total: result.total,
      processed: result.processed,
      succeeded: result.succeeded,
      failed: result.failed,
      successRatePct: rate,
    });
  }

  private defaultComponents(session: BrowserSession, credentials: Credentials, logger: Logger): BatchComponents {
    const resolver = new LocatorResolver({ pollInterval: this.timings.pollIntervalMs, logger });
    const shared = { session, resolver, timings: this.timings, logger };

    return {
      authenticator: new SessionController({ ...shared, profile: this.profile.login }),
      navigator: new PageNavigator({ ...shared, profile: this.profile.navigation, startUrl: credentials.url }),
      submitter: new EntrySubmitter({ ...shared, profile: this.profile.entry }),
    };
  }
}

// ── Background run handle ───────────────────────────────────────────────

export interface BatchHandle {
  /** Settles with the result once the run ends. */
  readonly done: Promise<BatchResult>;
  /** Request cooperative cancellation; honoured before the next date. */
  cancel(): void;
  state(): RunState;
}

export function startBatch(driver: BatchDriver, input: Omit<BatchRunInput, 'isCancelled'>): BatchHandle {
  const token = new CancellationToken();
  const done = driver.run({ ...input, isCancelled: token.isCancelled });

  return {
    done,
    cancel: () => token.cancel(),
    state: () => driver.getState(),
  };
}
