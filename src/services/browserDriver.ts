import { ViewportSize } from '../models/harvest';

// The slice of a browser automation engine the harvester needs. The
// production implementation lives in playwrightDriver.ts.

export interface PageElement {
  /** Rendered text; may reject for detached or non-HTML elements. */
  innerText(): Promise<string>;
  textContent(): Promise<string | null>;
}

export interface NavigateOptions {
  timeoutMs: number;
}

export interface BrowserPage {
  setViewportSize(size: ViewportSize): Promise<void>;
  /** Resolves once the network has gone idle; rejects on error or timeout. */
  goto(url: string, options: NavigateOptions): Promise<void>;
  queryAll(selector: string): Promise<PageElement[]>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<BrowserDriver>;
