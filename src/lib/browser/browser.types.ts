/**
 * Browser Capability Types
 * What the audits and the crawler need from a rendering engine
 */

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

export interface NavigationOptions {
  timeoutMs: number;
  waitUntil?: WaitUntil;
}

export interface NavigationTiming {
  fetchStart: number;
  domainLookupStart: number;
  domainLookupEnd: number;
  connectStart: number;
  connectEnd: number;
  requestStart: number;
  responseStart: number;
  responseEnd: number;
  domContentLoadedEventStart: number;
  domContentLoadedEventEnd: number;
  loadEventEnd: number;
}

export interface PaintTiming {
  firstPaint: number | null;
  firstContentfulPaint: number | null;
}

/**
 * Computed colors of a text element, sampled in document order
 */
export interface TextStyleSample {
  tagName: string;
  index: number;
  text: string;
  color: string;
  backgroundColor: string;
}

/**
 * One open tab
 */
export interface RenderedPage {
  /** Navigate and return the main response status (null when there was none) */
  goto(url: string, options: NavigationOptions): Promise<number | null>;
  waitForNetworkIdle(timeoutMs: number): Promise<void>;
  settle(ms: number): Promise<void>;
  title(): Promise<string>;
  content(): Promise<string>;
  bodyText(): Promise<string>;
  /** Resolves false when the selector did not appear in time */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  navigationTiming(): Promise<NavigationTiming | null>;
  paintTiming(): Promise<PaintTiming>;
  resourceInitiatorTypes(): Promise<string[]>;
  textStyleSamples(limit: number): Promise<TextStyleSample[]>;
  close(): Promise<void>;
}

export interface PageOptions {
  userAgent?: string;
  viewport?: { width: number; height: number };
  extraHeaders?: Record<string, string>;
  defaultTimeoutMs?: number;
}

export interface BrowserSession {
  newPage(options?: PageOptions): Promise<RenderedPage>;
  close(): Promise<void>;
}

export interface BrowserLaunchOptions {
  headless: boolean;
}

export interface BrowserProvider {
  launch(options: BrowserLaunchOptions): Promise<BrowserSession>;
}
