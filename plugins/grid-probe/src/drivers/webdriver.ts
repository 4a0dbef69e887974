/**
 * Selenium Grid backend. Talks the WebDriver protocol to `<hub>/wd/hub`
 * through selenium-webdriver.
 */

import webdriver from 'selenium-webdriver';
import type { WebDriver } from 'selenium-webdriver';
import chrome from 'selenium-webdriver/chrome.js';
import firefox from 'selenium-webdriver/firefox.js';
import { gridEndpoint } from '../config.js';
import {
  CHROME_USER_AGENT,
  CHROME_WINDOW_SIZE,
  FIREFOX_WINDOW_HEIGHT,
  FIREFOX_WINDOW_WIDTH,
  SUPPORTED_BROWSERS,
  UNKNOWN,
} from '../constants.js';
import { UnsupportedBrowserError } from '../errors.js';
import type { BrowserCapabilities, RemoteBrowser, RemoteBrowserOptions } from './types.js';

const { Builder, By, until } = webdriver;

export function chromeArguments(): string[] {
  return [
    '--no-sandbox',
    '--disable-dev-shm-usage',
    '--disable-gpu',
    `--window-size=${CHROME_WINDOW_SIZE}`,
    `--user-agent=${CHROME_USER_AGENT}`,
  ];
}

export function firefoxArguments(): string[] {
  return [`--width=${FIREFOX_WINDOW_WIDTH}`, `--height=${FIREFOX_WINDOW_HEIGHT}`];
}

function capabilityString(value: unknown): string {
  return typeof value === 'string' && value !== '' ? value : UNKNOWN;
}

export class WebDriverBrowser implements RemoteBrowser {
  constructor(private readonly driver: WebDriver) {}

  async getCapabilities(): Promise<BrowserCapabilities> {
    const caps = await this.driver.getCapabilities();
    return {
      browserName: capabilityString(caps.get('browserName')),
      browserVersion: capabilityString(caps.get('browserVersion')),
    };
  }

  async navigate(url: string): Promise<void> {
    await this.driver.get(url);
  }

  async waitForElement(selector: string, timeoutMs: number): Promise<void> {
    await this.driver.wait(until.elementLocated(By.css(selector)), timeoutMs);
  }

  getTitle(): Promise<string> {
    return this.driver.getTitle();
  }

  getPageSource(): Promise<string> {
    return this.driver.getPageSource();
  }

  getCurrentUrl(): Promise<string> {
    return this.driver.getCurrentUrl();
  }

  async getElementText(selector: string): Promise<string> {
    const element = await this.driver.findElement(By.css(selector));
    return element.getText();
  }

  async screenshot(): Promise<Buffer> {
    const base64 = await this.driver.takeScreenshot();
    return Buffer.from(base64, 'base64');
  }

  async quit(): Promise<void> {
    await this.driver.quit();
  }
}

/**
 * Opens a new session on the Grid hub with the probe's browser options.
 */
export async function createWebDriverBrowser(options: RemoteBrowserOptions): Promise<RemoteBrowser> {
  const endpoint = gridEndpoint(options.remoteUrl);
  const builder = new Builder().usingServer(endpoint);

  switch (options.browser) {
    case 'chrome': {
      const chromeOptions = new chrome.Options();
      chromeOptions.addArguments(...chromeArguments());
      builder.forBrowser('chrome').setChromeOptions(chromeOptions);
      break;
    }
    case 'firefox': {
      const firefoxOptions = new firefox.Options();
      firefoxOptions.addArguments(...firefoxArguments());
      builder.forBrowser('firefox').setFirefoxOptions(firefoxOptions);
      break;
    }
    default:
      throw new UnsupportedBrowserError(options.browser, SUPPORTED_BROWSERS);
  }

  const driver = await builder.build();
  return new WebDriverBrowser(driver);
}
