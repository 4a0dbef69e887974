import type { DriverBackend } from '../config.js';

export interface BrowserCapabilities {
  browserName: string;
  browserVersion: string;
}

/**
 * The handful of remote browser operations the probe needs, independent
 * of the client library that talks to the remote end.
 */
export interface RemoteBrowser {
  getCapabilities(): Promise<BrowserCapabilities>;
  navigate(url: string): Promise<void>;
  /** Polls until an element matching the CSS selector exists, or rejects after `timeoutMs`. */
  waitForElement(selector: string, timeoutMs: number): Promise<void>;
  getTitle(): Promise<string>;
  getPageSource(): Promise<string>;
  getCurrentUrl(): Promise<string>;
  /** Rejects when no element matches. */
  getElementText(selector: string): Promise<string>;
  /** PNG bytes of the current viewport. */
  screenshot(): Promise<Buffer>;
  quit(): Promise<void>;
}

export interface RemoteBrowserOptions {
  browser: string;
  remoteUrl: string;
  backend: DriverBackend;
  timeoutMs: number;
}

export type RemoteBrowserFactory = (options: RemoteBrowserOptions) => Promise<RemoteBrowser>;
