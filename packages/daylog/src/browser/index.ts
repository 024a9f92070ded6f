export type {
  BrowserSession,
  BrowserLaunchOptions,
  ControlSummary,
  DocumentScope,
  FrameHandle,
  PageElement,
  SessionFactory,
} from './types';
export { PlaywrightBrowserSession, toPlaywrightSelector } from './PlaywrightBrowserSession';
