/**
 * EntrySubmitter: Fills and sends one journal entry.
 *
 * Finds the form (top level first, then nested documents), types the
 * domestic-era date and the content, picks the category, submits, and
 * reads the verdict off the page. Every fault ends as an explicit failure
 * for that day; the frame scope is released on every path.
 */

import type { BrowserSession, ControlSummary, DocumentScope, PageElement } from '../browser/types';
import type { EntryProfile } from '../site/types';
import type { EntrySpec, LocatorCandidate, SubmissionOutcome } from './types';
import { LocatorResolver } from './LocatorResolver';
import { createMarkerClassifier, type OutcomeClassifier } from './OutcomeClassifier';
import { findInFrames, withFrame } from './frameScope';
import { toDomesticEra } from './calendar';
import { ResolutionTimeoutError, errorMessage } from './errors';
import { resolveTimings, sleep, type Timings } from '../config/timing';
import { getLogger, type Logger } from '../monitoring/logger';

const CONTROL_SAMPLE_SIZE = 50;

export interface EntrySubmitterOptions {
  session: BrowserSession;
  profile: EntryProfile;
  resolver?: LocatorResolver;
  /** Replaces the marker classifier built from the profile. */
  classifier?: OutcomeClassifier;
  timings?: Partial<Timings>;
  logger?: Logger;
}

export class EntrySubmitter {
  private session: BrowserSession;
  private profile: EntryProfile;
  private resolver: LocatorResolver;
  private classifier: OutcomeClassifier;
  private timings: Timings;
  private logger: Logger;

  constructor(options: EntrySubmitterOptions) {
    this.session = options.session;
    this.profile = options.profile;
    this.timings = resolveTimings(options.timings);
    this.logger = (options.logger ?? getLogger()).child({ component: 'submitter' });
    this.resolver =
      options.resolver ??
      new LocatorResolver({ pollInterval: this.timings.pollIntervalMs, logger: this.logger });
    this.classifier = options.classifier ?? createMarkerClassifier(this.profile.markers);
  }

  async submit(entry: EntrySpec): Promise<SubmissionOutcome> {
    const log = this.logger.child({ date: entry.date });

    try {
      const eraDate = toDomesticEra(entry.date);
      log.info('Filling entry', { eraDate, category: entry.category });

      await sleep(this.timings.formLoadMs);
      const frameIndex = await this.locateForm(log);

      let formText: string | null = null;
      if (frameIndex === null) {
        await this.fillAndSend(this.session.activeScope(), entry, eraDate, log);
      } else {
        formText = await withFrame(this.session, frameIndex, async (scope) => {
          await this.fillAndSend(scope, entry, eraDate, log);
          return this.readFrameText(scope, log);
        });
      }

      const topText = await this.session.visibleText();
      return this.classify(formText ? `${topText}\n${formText}` : topText, log);
    } catch (err) {
      const reason = errorMessage(err);
      log.error('Entry submission failed', { error: reason });
      return { kind: 'explicit_failure', reason };
    }
  }

  /** Index of the nested document holding the form, or null for the top level. */
  private async locateForm(log: Logger): Promise<number | null> {
    const atTop = await this.resolver.resolve(this.session.activeScope(), this.profile.dateField, {
      role: 'form location',
      timeoutMs: 0,
    });
    if (atTop.element) return null;

    const index = await findInFrames(
      this.session,
      async (scope, i) => {
        const found = await this.resolver.resolve(scope, this.profile.dateField, {
          role: 'form location',
          timeoutMs: 0,
        });
        return found.element ? i : null;
      },
      (i, err) => log.warn('Could not inspect nested document', { frame: i, error: errorMessage(err) }),
    );

    if (index !== null) log.info('Entry form found in nested document', { frame: index });
    return index;
  }

  private async fillAndSend(scope: DocumentScope, entry: EntrySpec, eraDate: string, log: Logger): Promise<void> {
    const date = await this.requireControl(scope, this.profile.dateField, 'date field', log);
    await date.clear();
    await date.type(eraDate);
    await sleep(this.timings.typeSettleMs);

    const content = await this.requireControl(scope, this.profile.contentField, 'content field', log);
    await content.clear();
    await content.type(entry.content);
    await sleep(this.timings.typeSettleMs);

    await this.selectCategory(scope, entry.category, log);

    const submit = await this.requireControl(scope, this.profile.submit, 'submit control', log);
    log.info('Submitting entry');
    await submit.click();
    await sleep(this.timings.submitSettleMs);
  }

  /** A miss logs the controls the document does have, then rethrows. */
  private async requireControl(
    scope: DocumentScope,
    candidates: readonly LocatorCandidate[],
    role: string,
    log: Logger,
  ): Promise<PageElement> {
    try {
      const found = await this.resolver.require(scope, candidates, { role, timeoutMs: this.timings.fieldTimeoutMs });
      return found.element;
    } catch (err) {
      if (err instanceof ResolutionTimeoutError) {
        log.error('Required control missing', { role, controls: await this.listControls(scope, log) });
      }
      throw err;
    }
  }

  private async listControls(scope: DocumentScope, log: Logger): Promise<ControlSummary[]> {
    try {
      return await scope.describeControls(CONTROL_SAMPLE_SIZE);
    } catch (err) {
      log.debug('Form controls could not be listed', { error: errorMessage(err) });
      return [];
    }
  }

  /** A missing selector or option is a warning: the site may apply its default category. */
  private async selectCategory(scope: DocumentScope, category: string, log: Logger): Promise<void> {
    const select = await this.resolver.resolve(scope, this.profile.categoryField, {
      role: 'category selector',
      timeoutMs: this.timings.linkTimeoutMs,
    });
    if (!select.element) {
      log.warn('Category selector not found, submitting without it', { category });
      return;
    }

    try {
      if (await select.element.selectOption(category)) return;
      const options = await select.element.optionValues();
      log.warn('Category not among the available options', { category, options });
    } catch (err) {
      log.warn('Category selection failed', { category, error: errorMessage(err) });
    }
  }

  private async readFrameText(scope: DocumentScope, log: Logger): Promise<string> {
    try {
      return await scope.visibleText();
    } catch (err) {
      // The frame may have navigated away after submit.
      log.debug('Nested document text unavailable after submit', { error: errorMessage(err) });
      return '';
    }
  }

  private classify(text: string, log: Logger): SubmissionOutcome {
    const result = this.classifier.classify(text);

    switch (result.verdict) {
      case 'positive':
        log.info('Entry accepted', { marker: result.marker });
        return { kind: 'success' };
      case 'negative':
        log.warn('Entry rejected by the site', { marker: result.marker });
        return { kind: 'explicit_failure', reason: `Site reported "${result.marker ?? ''}"` };
      case 'none':
        log.info('Entry submitted, no status message found');
        return { kind: 'ambiguous' };
    }
  }
}
