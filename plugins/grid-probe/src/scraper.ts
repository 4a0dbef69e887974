/**
 * RemoteScraper: one remote browser session, one page visit, one
 * screenshot.
 *
 * ```ts
 * const scraper = createScraperFromEnv();
 * const result = await scraper.withSession(() => scraper.scrapeTestPage());
 * ```
 */

import { loadConfig, redactUrl, type DriverBackend, type Env } from './config.js';
import {
  DEFAULT_BROWSER,
  DEFAULT_REMOTE_URL_LOCAL,
  DEFAULT_SCREENSHOT_DIR,
  DEFAULT_SCREENSHOT_NAME,
  DEFAULT_TIMEOUT_SECONDS,
  NOT_AVAILABLE,
  TEST_URL,
  WAIT_SELECTOR,
} from './constants.js';
import { createRemoteBrowser, type RemoteBrowser, type RemoteBrowserFactory } from './drivers/index.js';
import { ConnectionError, NotConnectedError, ProbeError, errorMessage } from './errors.js';
import { getLogger, type Logger } from './logger.js';
import { saveScreenshot } from './screenshot.js';

export type ExecutionMode = 'selenium_grid' | 'browserless_cdp';

export interface ScrapeResult {
  status: 'success';
  title: string;
  h1Text: string;
  /** Length of the page source, as a decimal string. */
  pageSourceLength: string;
  url: string;
  browserName: string;
  browserVersion: string;
  executionMode: ExecutionMode;
}

export interface ScrapeFailure {
  status: 'error';
  error: string;
  /** The URL that was attempted. */
  url: string;
}

export type ScrapeOutcome = ScrapeResult | ScrapeFailure;

export interface RemoteScraperOptions {
  browser?: string;
  remoteUrl?: string;
  backend?: DriverBackend;
  timeoutMs?: number;
  targetUrl?: string;
  screenshotDir?: string;
  logger?: Logger;
  /** Opens the remote session. Defaults to the selenium-webdriver / playwright-core backends. */
  createBrowser?: RemoteBrowserFactory;
}

const EXECUTION_MODES: Record<DriverBackend, ExecutionMode> = {
  webdriver: 'selenium_grid',
  cdp: 'browserless_cdp',
};

export function screenshotFilename(browser: string): string {
  return `test_${browser}_screenshot.png`;
}

export class RemoteScraper {
  readonly browser: string;
  readonly remoteUrl: string;
  readonly backend: DriverBackend;
  readonly timeoutMs: number;
  readonly targetUrl: string;
  readonly screenshotDir: string;

  private readonly logger: Logger;
  private readonly createBrowser: RemoteBrowserFactory;
  private session: RemoteBrowser | null = null;

  constructor(options: RemoteScraperOptions = {}) {
    this.browser = (options.browser ?? DEFAULT_BROWSER).toLowerCase();
    this.remoteUrl = options.remoteUrl ?? DEFAULT_REMOTE_URL_LOCAL;
    this.backend = options.backend ?? 'webdriver';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_SECONDS * 1000;
    this.targetUrl = options.targetUrl ?? TEST_URL;
    this.screenshotDir = options.screenshotDir ?? DEFAULT_SCREENSHOT_DIR;
    this.logger = options.logger ?? getLogger('scraper');
    this.createBrowser = options.createBrowser ?? createRemoteBrowser;
  }

  get isConnected(): boolean {
    return this.session !== null;
  }

  async connect(): Promise<void> {
    const label = this.browser.charAt(0).toUpperCase() + this.browser.slice(1);
    this.logger.info(`Connecting to remote ${label} at ${redactUrl(this.remoteUrl)}...`);

    try {
      this.session = await this.createBrowser({
        browser: this.browser,
        remoteUrl: this.remoteUrl,
        backend: this.backend,
        timeoutMs: this.timeoutMs,
      });

      const { browserName, browserVersion } = await this.session.getCapabilities();
      this.logger.info(`Connected successfully! Browser: ${browserName} ${browserVersion}`);
    } catch (err) {
      this.logger.error(`Failed to connect to Remote WebDriver: ${errorMessage(err)}`);
      await this.disconnect();
      if (err instanceof ProbeError) {
        throw err;
      }
      throw new ConnectionError(`Failed to connect to Remote WebDriver: ${errorMessage(err)}`, err);
    }
  }

  /** Ends the session. Errors from the remote end are logged, not raised. */
  async disconnect(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }

    this.session = null;
    try {
      await session.quit();
      this.logger.info('Remote WebDriver disconnected');
    } catch (err) {
      this.logger.warn(`Error during disconnect: ${errorMessage(err)}`);
    }
  }

  /**
   * Connects, runs `fn`, and disconnects whether or not `fn` succeeded.
   */
  async withSession<T>(fn: (scraper: this) => Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await fn(this);
    } finally {
      await this.disconnect();
    }
  }

  private requireSession(): RemoteBrowser {
    if (!this.session) {
      throw new NotConnectedError();
    }
    return this.session;
  }

  async scrapeTestPage(): Promise<ScrapeResult> {
    const session = this.requireSession();

    try {
      this.logger.info('Navigating to test page...');
      await session.navigate(this.targetUrl);
      await session.waitForElement(WAIT_SELECTOR, this.timeoutMs);

      const title = await session.getTitle();
      const pageSource = await session.getPageSource();
      const url = await session.getCurrentUrl();

      let h1Text: string;
      try {
        h1Text = await session.getElementText(WAIT_SELECTOR);
      } catch (err) {
        this.logger.debug(`No ${WAIT_SELECTOR} text available: ${errorMessage(err)}`);
        h1Text = NOT_AVAILABLE;
      }

      const { browserName, browserVersion } = await session.getCapabilities();

      const result: ScrapeResult = {
        status: 'success',
        title,
        h1Text,
        pageSourceLength: String(pageSource.length),
        url,
        browserName,
        browserVersion,
        executionMode: EXECUTION_MODES[this.backend],
      };

      this.logger.info('Test page scraped successfully');
      this.logger.debug(`Scraping result: ${JSON.stringify(result)}`);
      return result;
    } catch (err) {
      this.logger.error(`Scraping failed: ${errorMessage(err)}`);
      throw err;
    }
  }

  /**
   * Like scrapeTestPage, but reports a failed visit as a ScrapeFailure
   * instead of throwing. A missing session still throws.
   */
  async tryScrapeTestPage(): Promise<ScrapeOutcome> {
    this.requireSession();
    try {
      return await this.scrapeTestPage();
    } catch (err) {
      return { status: 'error', error: errorMessage(err), url: this.targetUrl };
    }
  }

  async takeScreenshot(
    filename: string = DEFAULT_SCREENSHOT_NAME,
    directory: string = this.screenshotDir,
  ): Promise<string> {
    const session = this.requireSession();

    try {
      const png = await session.screenshot();
      const screenshotPath = await saveScreenshot(png, directory, filename);
      this.logger.info(`Screenshot saved: ${screenshotPath}`);
      return screenshotPath;
    } catch (err) {
      this.logger.error(`Failed to save screenshot: ${errorMessage(err)}`);
      throw err;
    }
  }
}

/**
 * Builds a scraper from SELENIUM_* and related environment variables.
 */
export function createScraperFromEnv(
  env: Env = process.env,
  overrides: Pick<RemoteScraperOptions, 'logger' | 'createBrowser'> = {},
): RemoteScraper {
  const config = loadConfig(env);
  return new RemoteScraper({
    browser: config.browser,
    remoteUrl: config.remoteUrl,
    backend: config.backend,
    timeoutMs: config.timeoutMs,
    targetUrl: config.targetUrl,
    screenshotDir: config.screenshotDir,
    ...overrides,
  });
}
