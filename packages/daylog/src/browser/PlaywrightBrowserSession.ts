/**
 * PlaywrightBrowserSession: BrowserSession on top of playwright-core.
 *
 * Candidates map onto Playwright selectors (id/name become attribute
 * selectors, xpath gets the `xpath=` engine prefix). Nested documents are
 * the main frame's direct child frames; "entering" one swaps the scope that
 * queries run against.
 */

import { chromium, type Browser, type Frame, type Locator, type Page } from 'playwright-core';
import type { LocatorCandidate } from '../engine/types';
import { EnvironmentFaultError, errorMessage } from '../engine/errors';
import type {
  BrowserLaunchOptions,
  BrowserSession,
  ControlSummary,
  DocumentScope,
  FrameHandle,
  PageElement,
} from './types';

/** Upper bound on any single Playwright action (click, type, goto). */
const ACTION_TIMEOUT_MS = 15_000;

const CONTROL_TAGS = ['input', 'button', 'select', 'textarea'];

const LAUNCH_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'];

function quoteAttr(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function toPlaywrightSelector(candidate: LocatorCandidate): string {
  switch (candidate.strategy) {
    case 'id':
      return `[id="${quoteAttr(candidate.selector)}"]`;
    case 'name':
      return `[name="${quoteAttr(candidate.selector)}"]`;
    case 'css':
    case 'tag':
      return candidate.selector;
    case 'xpath':
      return `xpath=${candidate.selector}`;
  }
}

class PlaywrightElement implements PageElement {
  constructor(private readonly locator: Locator) {}

  async clear(): Promise<void> {
    await this.locator.scrollIntoViewIfNeeded();
    await this.locator.clear();
  }

  async type(text: string): Promise<void> {
    await this.locator.pressSequentially(text);
  }

  async click(): Promise<void> {
    await this.locator.scrollIntoViewIfNeeded();
    await this.locator.click();
  }

  async press(key: string): Promise<void> {
    await this.locator.press(key);
  }

  async optionValues(): Promise<string[]> {
    const options = await this.locator.locator('option').all();
    const values = await Promise.all(options.map((option) => option.getAttribute('value')));
    return values.filter((v): v is string => v !== null);
  }

  async selectOption(value: string): Promise<boolean> {
    const values = await this.optionValues();
    if (!values.includes(value)) return false;
    await this.locator.selectOption({ value });
    return true;
  }
}

class PlaywrightScope implements DocumentScope {
  constructor(private readonly frame: Frame) {}

  async query(candidate: LocatorCandidate): Promise<PageElement | null> {
    const locator = this.frame.locator(toPlaywrightSelector(candidate)).first();
    if ((await locator.count()) === 0) return null;

    if (candidate.clickable) {
      const usable = (await locator.isVisible()) && (await locator.isEnabled());
      if (!usable) return null;
    }

    return new PlaywrightElement(locator);
  }

  async visibleText(): Promise<string> {
    const body = this.frame.locator('body').first();
    if ((await body.count()) === 0) return '';
    return body.innerText();
  }

  pageSource(): Promise<string> {
    return this.frame.content();
  }

  async describeControls(limit: number): Promise<ControlSummary[]> {
    const controls: ControlSummary[] = [];
    for (const tag of CONTROL_TAGS) {
      for (const control of await this.frame.locator(tag).all()) {
        if (controls.length >= limit) return controls;
        controls.push({
          tag,
          id: await control.getAttribute('id'),
          name: await control.getAttribute('name'),
          type: await control.getAttribute('type'),
          value: await control.getAttribute('value'),
          placeholder: await control.getAttribute('placeholder'),
          onclick: await control.getAttribute('onclick'),
        });
      }
    }
    return controls;
  }
}

export class PlaywrightBrowserSession implements BrowserSession {
  private readonly top: PlaywrightScope;
  private active: PlaywrightScope;
  private activeFrame: number | null = null;

  constructor(
    private readonly page: Page,
    private readonly browser: Browser | null = null,
  ) {
    this.page.setDefaultTimeout(ACTION_TIMEOUT_MS);
    this.top = new PlaywrightScope(page.mainFrame());
    this.active = this.top;
  }

  /** Launch Chromium and open one page. Launch problems surface as EnvironmentFaultError. */
  static async launch(options: BrowserLaunchOptions = {}): Promise<PlaywrightBrowserSession> {
    let browser: Browser;
    try {
      browser = await chromium.launch({
        headless: options.headless ?? false,
        channel: options.channel,
        executablePath: options.executablePath,
        args: LAUNCH_ARGS,
      });
    } catch (err) {
      throw new EnvironmentFaultError(`Browser could not be started: ${errorMessage(err)}`, err);
    }

    try {
      const page = await browser.newPage({ viewport: options.viewport ?? { width: 1280, height: 720 } });
      return new PlaywrightBrowserSession(page, browser);
    } catch (err) {
      await browser.close();
      throw new EnvironmentFaultError(`Browser page could not be opened: ${errorMessage(err)}`, err);
    }
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async currentUrl(): Promise<string> {
    return this.page.url();
  }

  visibleText(): Promise<string> {
    return this.top.visibleText();
  }

  pageSource(): Promise<string> {
    return this.top.pageSource();
  }

  async linkTexts(limit: number): Promise<string[]> {
    const texts: string[] = [];
    for (const link of await this.page.locator('a').all()) {
      if (texts.length >= limit) break;
      const text = (await link.innerText()).trim();
      if (text) texts.push(text);
    }
    return texts;
  }

  async frameCount(): Promise<number> {
    return this.page.mainFrame().childFrames().length;
  }

  async enterFrame(index: number): Promise<FrameHandle> {
    if (this.activeFrame !== null) {
      throw new Error(`Already inside nested document ${this.activeFrame}`);
    }

    const frame = this.page.mainFrame().childFrames()[index];
    if (!frame) {
      throw new Error(`No nested document at index ${index}`);
    }

    this.active = new PlaywrightScope(frame);
    this.activeFrame = index;

    let released = false;
    return {
      index,
      release: async () => {
        if (released) return;
        released = true;
        this.active = this.top;
        this.activeFrame = null;
      },
    };
  }

  activeScope(): DocumentScope {
    return this.active;
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
    } else {
      await this.page.close();
    }
  }
}
