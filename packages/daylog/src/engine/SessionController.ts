/**
 * SessionController: Logs into the site and decides whether it worked.
 *
 * The login form is found through the profile's candidate lists. The
 * verdict is read off the page text, since the site returns no status.
 */

import type { BrowserSession, PageElement } from '../browser/types';
import type { LoginProfile } from '../site/types';
import type { AuthOutcome, Credentials } from './types';
import { LocatorResolver } from './LocatorResolver';
import { createMarkerClassifier, type OutcomeClassifier } from './OutcomeClassifier';
import { errorMessage } from './errors';
import { resolveTimings, sleep, type Timings } from '../config/timing';
import { getLogger, type Logger } from '../monitoring/logger';

export interface SessionControllerOptions {
  session: BrowserSession;
  profile: LoginProfile;
  resolver?: LocatorResolver;
  /** Replaces the marker classifier built from the profile. */
  classifier?: OutcomeClassifier;
  timings?: Partial<Timings>;
  logger?: Logger;
}

export class SessionController {
  private session: BrowserSession;
  private profile: LoginProfile;
  private resolver: LocatorResolver;
  private classifier: OutcomeClassifier | null;
  private timings: Timings;
  private logger: Logger;

  constructor(options: SessionControllerOptions) {
    this.session = options.session;
    this.profile = options.profile;
    this.timings = resolveTimings(options.timings);
    this.logger = (options.logger ?? getLogger()).child({ component: 'session' });
    this.resolver =
      options.resolver ??
      new LocatorResolver({ pollInterval: this.timings.pollIntervalMs, logger: this.logger });
    this.classifier = options.classifier ?? null;
  }

  async authenticate(credentials: Credentials): Promise<AuthOutcome> {
    try {
      this.logger.info('Opening login page', { url: credentials.url });
      await this.session.goto(credentials.url);
      await sleep(this.timings.loginSettleMs);

      const scope = this.session.activeScope();
      const timeoutMs = this.timings.fieldTimeoutMs;

      const account = await this.resolver.require(scope, this.profile.accountField, {
        role: 'account field',
        timeoutMs,
      });
      const secret = await this.resolver.require(scope, this.profile.secretField, {
        role: 'secret field',
        timeoutMs,
      });

      await this.typeInto(account.element, credentials.accountId);
      await this.typeInto(secret.element, credentials.secret);

      const submit = await this.resolver.resolve(scope, this.profile.submit, {
        role: 'login submit control',
        timeoutMs: this.timings.linkTimeoutMs,
      });
      if (submit.element) {
        await submit.element.click();
      } else {
        this.logger.info('No login button found, submitting with Enter');
        await secret.element.press('Enter');
      }

      await sleep(this.timings.authSettleMs);

      const text = await this.session.visibleText();
      const verdict = this.classifierFor(credentials).classify(text);
      if (verdict.verdict === 'positive') {
        this.logger.info('Login succeeded', { marker: verdict.marker });
        return { ok: true };
      }

      this.logger.error('Login failed: no signed-in marker on page');
      return { ok: false, reason: 'No signed-in marker found on the page after login' };
    } catch (err) {
      const reason = errorMessage(err);
      this.logger.error('Login failed', { error: reason });
      return { ok: false, reason };
    }
  }

  private classifierFor(credentials: Credentials): OutcomeClassifier {
    if (this.classifier) return this.classifier;
    // The signed-in page echoes the account id, so it doubles as a marker.
    return createMarkerClassifier({
      positive: [...this.profile.markers.positive, credentials.accountId],
      negative: this.profile.markers.negative,
    });
  }

  private async typeInto(element: PageElement, value: string): Promise<void> {
    await element.clear();
    await element.type(value);
    await sleep(this.timings.typeSettleMs);
  }
}
