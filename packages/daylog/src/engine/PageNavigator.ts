/**
 * PageNavigator: Puts the browser on a fresh entry form.
 *
 * Strategies run in order until one lands on the form:
 *   1. link        click a feature link in the top-level document
 *   2. frame       look for the link inside each nested document
 *   3. direct_url  visit the known form paths under the site root
 *   4. manual      wait a bounded window for someone to click through
 */

import type { BrowserSession } from '../browser/types';
import type { NavigationProfile } from '../site/types';
import type { NavigationOutcome, NavigationStrategy } from './types';
import { LocatorResolver, describeCandidate } from './LocatorResolver';
import { containsAny } from './OutcomeClassifier';
import { findInFrames } from './frameScope';
import { errorMessage } from './errors';
import { resolveTimings, sleep, type Timings } from '../config/timing';
import { getLogger, type Logger } from '../monitoring/logger';

export interface PageNavigatorOptions {
  session: BrowserSession;
  profile: NavigationProfile;
  /** The URL the run started from; fallback root for direct visits. */
  startUrl: string;
  resolver?: LocatorResolver;
  timings?: Partial<Timings>;
  logger?: Logger;
}

/**
 * Candidate form URLs: the profile's path suffixes appended to the site
 * root, taken from the current URL when it contains the root segment,
 * else from the start URL.
 */
export function entryFormUrls(currentUrl: string, startUrl: string, profile: NavigationProfile): string[] {
  const segment = profile.rootSegment;
  let root: string;
  if (currentUrl.includes(segment)) {
    root = currentUrl.split(segment)[0];
  } else if (startUrl.includes(segment)) {
    root = startUrl.split(segment)[0];
  } else {
    root = startUrl.replace(/\/+$/, '');
  }
  return profile.pathSuffixes.map((suffix) => `${root}${suffix}`);
}

export class PageNavigator {
  private session: BrowserSession;
  private profile: NavigationProfile;
  private startUrl: string;
  private resolver: LocatorResolver;
  private timings: Timings;
  private logger: Logger;

  constructor(options: PageNavigatorOptions) {
    this.session = options.session;
    this.profile = options.profile;
    this.startUrl = options.startUrl;
    this.timings = resolveTimings(options.timings);
    this.logger = (options.logger ?? getLogger()).child({ component: 'navigator' });
    this.resolver =
      options.resolver ??
      new LocatorResolver({ pollInterval: this.timings.pollIntervalMs, logger: this.logger });
  }

  async reachEntryForm(): Promise<NavigationOutcome> {
    const strategies: Array<[NavigationStrategy, () => Promise<boolean>]> = [
      ['link', () => this.viaLink()],
      ['frame', () => this.viaFrames()],
      ['direct_url', () => this.viaDirectUrl()],
      ['manual', () => this.viaManualWindow()],
    ];

    for (const [strategy, attempt] of strategies) {
      try {
        if (await attempt()) {
          this.logger.info('Entry form reached', { strategy });
          return { reached: true, strategy };
        }
        this.logger.debug('Navigation strategy did not reach the form', { strategy });
      } catch (err) {
        this.logger.warn('Navigation strategy failed', { strategy, error: errorMessage(err) });
      }
    }

    this.logger.error('Entry form unreachable by every navigation strategy');
    return { reached: false };
  }

  /** URL or markup shows the entry form. Reads the top-level document. */
  async isOnEntryForm(): Promise<boolean> {
    const url = await this.session.currentUrl();
    if (containsAny(url, this.profile.urlMarkers)) return true;
    const source = await this.session.pageSource();
    return containsAny(source, this.profile.sourceMarkers);
  }

  private async viaLink(): Promise<boolean> {
    for (const candidate of this.profile.featureLinks) {
      const link = await this.resolver.resolve(this.session.activeScope(), [candidate], {
        role: 'feature link',
        timeoutMs: this.timings.linkTimeoutMs,
      });
      if (!link.element) continue;

      this.logger.info('Clicking feature link', { candidate: describeCandidate(candidate) });
      await link.element.click();
      await sleep(this.timings.navigationSettleMs);

      if (await this.isOnEntryForm()) return true;
    }
    return false;
  }

  private async viaFrames(): Promise<boolean> {
    const clicked = await findInFrames(
      this.session,
      async (scope, index) => {
        const link = await this.resolver.resolve(scope, this.profile.featureLinks, {
          role: 'feature link in nested document',
          timeoutMs: 0,
        });
        if (!link.element) return null;

        this.logger.info('Clicking feature link inside nested document', { frame: index });
        await link.element.click();
        await sleep(this.timings.navigationSettleMs);
        return { index, frameShowsForm: containsAny(await scope.pageSource(), this.profile.sourceMarkers) };
      },
      (index, err) => {
        this.logger.warn('Nested document search failed', { frame: index, error: errorMessage(err) });
      },
    );

    if (!clicked) return false;
    return clicked.frameShowsForm || (await this.isOnEntryForm());
  }

  private async viaDirectUrl(): Promise<boolean> {
    const currentUrl = await this.session.currentUrl();

    for (const url of entryFormUrls(currentUrl, this.startUrl, this.profile)) {
      try {
        this.logger.info('Visiting entry form directly', { url });
        await this.session.goto(url);
        await sleep(this.timings.navigationSettleMs);
        if (await this.isOnEntryForm()) return true;
      } catch (err) {
        this.logger.warn('Direct visit failed', { url, error: errorMessage(err) });
      }
    }
    return false;
  }

  private async viaManualWindow(): Promise<boolean> {
    const links = await this.sampleLinks();
    this.logger.warn('Automatic navigation failed, waiting for manual navigation', {
      windowMs: this.timings.manualWindowMs,
      links,
    });
    await sleep(this.timings.manualWindowMs);
    return this.isOnEntryForm();
  }

  /** Link texts for the operator; the window opens even when they cannot be read. */
  private async sampleLinks(): Promise<string[]> {
    try {
      return await this.session.linkTexts(this.profile.linkSampleSize);
    } catch (err) {
      this.logger.debug('Link texts unavailable', { error: errorMessage(err) });
      return [];
    }
  }
}
