/**
 * One probe run: configure, connect, scrape, screenshot, report.
 * Returns the process exit code instead of exiting so it can be tested.
 */

import { printBanner, printFailure, printResult, type Printer } from './banner.js';
import { loadConfig, type Env, type ProbeConfig } from './config.js';
import type { RemoteBrowserFactory } from './drivers/index.js';
import { errorMessage } from './errors.js';
import { getLogger, setLogLevel, type Logger } from './logger.js';
import { RemoteScraper, screenshotFilename, type ScrapeOutcome } from './scraper.js';

export interface RunDependencies {
  createBrowser?: RemoteBrowserFactory;
  logger?: Logger;
  out?: Printer;
}

interface SessionOutcome {
  outcome: ScrapeOutcome;
  screenshotPath: string | null;
}

export async function run(env: Env = process.env, deps: RunDependencies = {}): Promise<number> {
  const out: Printer = deps.out ?? ((line) => console.log(line));

  let config: ProbeConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    printFailure(errorMessage(err), null, out);
    return 1;
  }

  if (!deps.logger) {
    setLogLevel(config.logLevel);
  }
  const logger = deps.logger ?? getLogger('app');

  printBanner(config, out);

  const scraper = new RemoteScraper({
    browser: config.browser,
    remoteUrl: config.remoteUrl,
    backend: config.backend,
    timeoutMs: config.timeoutMs,
    targetUrl: config.targetUrl,
    screenshotDir: config.screenshotDir,
    logger: deps.logger,
    createBrowser: deps.createBrowser,
  });

  try {
    logger.info(`Starting remote browser test with ${config.browser}...`);

    const { outcome, screenshotPath } = await scraper.withSession(async (session): Promise<SessionOutcome> => {
      const outcome = await session.tryScrapeTestPage();
      if (outcome.status === 'error') {
        return { outcome, screenshotPath: null };
      }

      try {
        return { outcome, screenshotPath: await session.takeScreenshot(screenshotFilename(config.browser)) };
      } catch (err) {
        logger.warn(`Continuing without screenshot: ${errorMessage(err)}`);
        return { outcome, screenshotPath: null };
      }
    });

    if (outcome.status === 'error') {
      out(`❌ Test failed: ${outcome.error}`);
      return 1;
    }

    printResult(outcome, screenshotPath, config, out);
    return 0;
  } catch (err) {
    logger.error(`Application error: ${errorMessage(err)}`);
    printFailure(errorMessage(err), config, out);
    return 1;
  }
}
