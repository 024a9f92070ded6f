import type { LocatorCandidate } from '../engine/types';

/**
 * Abstraction over the browser engine.
 *
 * Every page interaction in daylog goes through these interfaces.
 * Only PlaywrightBrowserSession may import from playwright-core directly.
 */

/** An element found in a document. */
export interface PageElement {
  clear(): Promise<void>;
  type(text: string): Promise<void>;
  click(): Promise<void>;
  press(key: string): Promise<void>;
  /** `value` attributes of the options of a list-valued control. */
  optionValues(): Promise<string[]>;
  /** Select the option whose value matches; false when no option does. */
  selectOption(value: string): Promise<boolean>;
}

/** Attributes of one form control, logged when a required lookup misses. */
export interface ControlSummary {
  tag: string;
  id: string | null;
  name: string | null;
  type: string | null;
  value: string | null;
  placeholder: string | null;
  onclick: string | null;
}

/** One document: the top-level page or a nested frame. */
export interface DocumentScope {
  /**
   * Single lookup, no waiting. Returns the first match, or null. For a
   * `clickable` candidate the match must also be visible and enabled.
   */
  query(candidate: LocatorCandidate): Promise<PageElement | null>;
  visibleText(): Promise<string>;
  pageSource(): Promise<string>;
  /** Up to `limit` inputs, buttons, selects and text areas, grouped by tag. */
  describeControls(limit: number): Promise<ControlSummary[]>;
}

/** Active nested-document context; release() restores the previous one. */
export interface FrameHandle {
  readonly index: number;
  release(): Promise<void>;
}

export interface BrowserSession {
  goto(url: string): Promise<void>;
  currentUrl(): Promise<string>;
  /** Visible text of the top-level document. */
  visibleText(): Promise<string>;
  /** Serialized markup of the top-level document. */
  pageSource(): Promise<string>;
  /** Trimmed, non-empty link texts in the top-level document. */
  linkTexts(limit: number): Promise<string[]>;
  /** Nested documents directly below the top level. */
  frameCount(): Promise<number>;
  /** Make frame `index` the active scope. Nested entry is not supported. */
  enterFrame(index: number): Promise<FrameHandle>;
  /** The document queries currently run against. */
  activeScope(): DocumentScope;
  close(): Promise<void>;
}

export interface BrowserLaunchOptions {
  headless?: boolean;
  /** Installed browser channel, e.g. "chrome" or "msedge". */
  channel?: string;
  executablePath?: string;
  viewport?: { width: number; height: number };
}

export type SessionFactory = () => Promise<BrowserSession>;
