export { RemoteScraper, createScraperFromEnv, screenshotFilename } from './scraper.js';
export type { ExecutionMode, RemoteScraperOptions, ScrapeFailure, ScrapeOutcome, ScrapeResult } from './scraper.js';
export {
  backendForUrl,
  detectEnvironment,
  gridConsoleUrl,
  gridEndpoint,
  loadConfig,
  loadDotenv,
  redactUrl,
  resolveRemoteUrl,
} from './config.js';
export type { DeploymentEnvironment, DriverBackend, Env, LogLevel, ProbeConfig } from './config.js';
export { createRemoteBrowser, isSupportedBrowser } from './drivers/index.js';
export type { BrowserCapabilities, RemoteBrowser, RemoteBrowserFactory, RemoteBrowserOptions } from './drivers/index.js';
export {
  ConfigurationError,
  ConnectionError,
  NotConnectedError,
  ProbeError,
  UnsupportedBrowserError,
} from './errors.js';
export { createLogger, getLogger } from './logger.js';
export { run } from './run.js';
export { SUPPORTED_BROWSERS, type BrowserName } from './constants.js';
