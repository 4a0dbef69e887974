/**
 * Hosted-Chrome backend (Browserless and similar services).
 *
 * Connects to a remote Chrome over a CDP WebSocket with playwright-core.
 * The remote service owns the browser; closing our connection ends the
 * session on its side.
 */

import { chromium, type Browser, type Page } from 'playwright-core';
import { UNKNOWN, VIEWPORT } from '../constants.js';
import { UnsupportedBrowserError } from '../errors.js';
import type { BrowserCapabilities, RemoteBrowser, RemoteBrowserOptions } from './types.js';

const CDP_BROWSERS = ['chrome'] as const;

export class CdpBrowser implements RemoteBrowser {
  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
  ) {}

  async getCapabilities(): Promise<BrowserCapabilities> {
    return {
      browserName: this.browser.browserType().name() || UNKNOWN,
      browserVersion: this.browser.version() || UNKNOWN,
    };
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url);
  }

  async waitForElement(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
  }

  getTitle(): Promise<string> {
    return this.page.title();
  }

  getPageSource(): Promise<string> {
    return this.page.content();
  }

  async getCurrentUrl(): Promise<string> {
    return this.page.url();
  }

  async getElementText(selector: string): Promise<string> {
    const element = await this.page.$(selector);
    if (!element) {
      throw new Error(`No element matches selector: ${selector}`);
    }
    return element.innerText();
  }

  screenshot(): Promise<Buffer> {
    return this.page.screenshot({ type: 'png' });
  }

  async quit(): Promise<void> {
    await this.browser.close();
  }
}

export async function createCdpBrowser(options: RemoteBrowserOptions): Promise<RemoteBrowser> {
  if (options.browser !== 'chrome') {
    throw new UnsupportedBrowserError(options.browser, CDP_BROWSERS);
  }

  const browser = await chromium.connectOverCDP(options.remoteUrl, { timeout: options.timeoutMs });
  try {
    const context = browser.contexts()[0] ?? (await browser.newContext());
    const page = context.pages()[0] ?? (await context.newPage());
    await page.setViewportSize(VIEWPORT);
    return new CdpBrowser(browser, page);
  } catch (err) {
    // No CdpBrowser exists yet, so nothing else will close the connection.
    await browser.close().catch(() => {});
    throw err;
  }
}
