/**
 * Wiring for a real run: Playwright session, site profile and timings
 * taken from the environment.
 */

import { PlaywrightBrowserSession } from './browser/PlaywrightBrowserSession';
import type { SessionFactory } from './browser/types';
import { BatchDriver, type BatchDriverOptions } from './engine/BatchDriver';
import { getEnv, type Env } from './config/env';
import { loadSiteProfile } from './site/loadProfile';

export function playwrightSessionFactory(env: Env = getEnv()): SessionFactory {
  return () =>
    PlaywrightBrowserSession.launch({
      headless: env.DAYLOG_HEADLESS,
      channel: env.DAYLOG_BROWSER_CHANNEL,
      executablePath: env.DAYLOG_BROWSER_PATH,
    });
}

export function createBatchDriver(
  overrides: Partial<BatchDriverOptions> = {},
  env: Env = getEnv(),
): BatchDriver {
  return new BatchDriver({
    openSession: playwrightSessionFactory(env),
    profile: loadSiteProfile(env.DAYLOG_PROFILE_PATH),
    ...overrides,
  });
}
