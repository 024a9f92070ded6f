/**
 * LocatorResolver: Ordered fallback element finder.
 *
 * Given a list of LocatorCandidates, tries them in order and polls each
 * one until it resolves or its timeout elapses, then moves to the next.
 * Returns the first element found, along with which candidate matched.
 */

import type { DocumentScope, PageElement } from '../browser/types';
import type { LocatorCandidate } from './types';
import { ResolutionTimeoutError } from './errors';
import { sleep } from '../config/timing';
import { getLogger, type Logger } from '../monitoring/logger';

export interface ResolveResult {
  element: PageElement | null;
  candidate: LocatorCandidate | null;
  attempts: number;
}

export interface ResolveOptions {
  /** What the element is for ("account field", "submit control"); used in logs and errors. */
  role: string;
  /** Per-candidate bound in ms. 0 polls each candidate exactly once. */
  timeoutMs?: number;
}

export interface LocatorResolverOptions {
  /** Default per-candidate timeout in milliseconds. Default: 3000 */
  timeout?: number;
  /** Delay between polls of a pending candidate. Default: 250 */
  pollInterval?: number;
  /** Maximum retries on stale element errors. Default: 1 */
  maxRetries?: number;
  logger?: Logger;
}

export function describeCandidate(candidate: LocatorCandidate): string {
  return `${candidate.strategy}=${candidate.selector}`;
}

export class LocatorResolver {
  private timeout: number;
  private pollInterval: number;
  private maxRetries: number;
  private logger: Logger;

  constructor(options?: LocatorResolverOptions) {
    this.timeout = options?.timeout ?? 3000;
    this.pollInterval = options?.pollInterval ?? 250;
    this.maxRetries = options?.maxRetries ?? 1;
    this.logger = (options?.logger ?? getLogger()).child({ component: 'locator-resolver' });
  }

  /**
   * Resolve the first candidate that yields an element.
   * Later candidates are never queried once an earlier one matches.
   */
  async resolve(
    scope: DocumentScope,
    candidates: readonly LocatorCandidate[],
    options: ResolveOptions,
  ): Promise<ResolveResult> {
    const timeoutMs = options.timeoutMs ?? this.timeout;
    const log = this.logger.child({ role: options.role });
    let attempts = 0;

    for (const candidate of candidates) {
      attempts++;

      const element = await this.poll(scope, candidate, timeoutMs);
      if (element) {
        log.debug('Element resolved', {
          candidate: describeCandidate(candidate),
          attempts,
        });
        return { element, candidate, attempts };
      }
    }

    log.debug('No candidate resolved', { attempts });
    return { element: null, candidate: null, attempts };
  }

  /** Like resolve(), but a miss throws ResolutionTimeoutError naming the role. */
  async require(
    scope: DocumentScope,
    candidates: readonly LocatorCandidate[],
    options: ResolveOptions,
  ): Promise<{ element: PageElement; candidate: LocatorCandidate }> {
    const result = await this.resolve(scope, candidates, options);
    if (!result.element || !result.candidate) {
      throw new ResolutionTimeoutError(options.role, result.attempts);
    }
    return { element: result.element, candidate: result.candidate };
  }

  /** Poll one candidate until it resolves or the deadline passes. */
  private async poll(
    scope: DocumentScope,
    candidate: LocatorCandidate,
    timeoutMs: number,
  ): Promise<PageElement | null> {
    const deadline = Date.now() + timeoutMs;

    while (true) {
      const element = await this.tryQuery(scope, candidate);
      if (element) return element;
      if (Date.now() >= deadline) return null;
      await sleep(Math.min(this.pollInterval, Math.max(deadline - Date.now(), 0)));
    }
  }

  /** A single query, with retry for stale elements. Other errors count as a miss. */
  private async tryQuery(scope: DocumentScope, candidate: LocatorCandidate): Promise<PageElement | null> {
    let retriesLeft = this.maxRetries;

    while (true) {
      try {
        return await scope.query(candidate);
      } catch (err) {
        const message = err instanceof Error ? err.message : '';
        const isStale =
          message.includes('stale') ||
          message.includes('detached') ||
          message.includes('Element is not attached');

        if (isStale && retriesLeft > 0) {
          retriesLeft--;
          await sleep(100);
          continue;
        }

        this.logger.debug('Candidate query failed', { candidate: describeCandidate(candidate), error: message });
        return null;
      }
    }
  }
}
