/**
 * Defaults and environment variable names for grid-probe.
 */

export const SUPPORTED_BROWSERS = ['chrome', 'firefox'] as const;
export type BrowserName = (typeof SUPPORTED_BROWSERS)[number];

export const DEFAULT_BROWSER: BrowserName = 'chrome';

export const DEFAULT_REMOTE_URL_LOCAL = 'http://localhost:4444';
export const DEFAULT_REMOTE_URL_DOCKER = 'http://selenium:4444';
export const DEFAULT_REMOTE_URL_BROWSERLESS = 'wss://chrome.browserless.io';
export const GRID_HUB_PATH = '/wd/hub';

export const DEFAULT_TIMEOUT_SECONDS = 10;

export const TEST_URL = 'https://httpbin.org/html';
export const WAIT_SELECTOR = 'h1';

// Chrome
export const CHROME_WINDOW_SIZE = '1920,1080';
export const CHROME_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

// Firefox
export const FIREFOX_WINDOW_WIDTH = '1920';
export const FIREFOX_WINDOW_HEIGHT = '1080';

export const VIEWPORT = { width: 1920, height: 1080 } as const;

export const DEFAULT_SCREENSHOT_DIR = 'reports';
export const DEFAULT_SCREENSHOT_NAME = 'screenshot.png';
/** Screenshots larger than this on either side are shrunk to fit. */
export const MAX_SCREENSHOT_DIMENSION = 2000;

export const NOT_AVAILABLE = 'N/A';
export const UNKNOWN = 'unknown';

export const VNC_PORTS: Record<BrowserName, number> = {
  chrome: 7900,
  firefox: 7901,
};
export const VNC_PASSWORD = 'secret';

export const APP_TITLE = '🚀 grid-probe - Selenium Remote WebDriver';
export const BANNER_LENGTH = 60;

export const ENV = {
  BROWSER: 'SELENIUM_BROWSER',
  REMOTE_URL: 'SELENIUM_REMOTE_URL',
  HUB_URL: 'SELENIUM_HUB_URL',
  TIMEOUT: 'SELENIUM_TIMEOUT',
  BROWSERLESS_TOKEN: 'BROWSERLESS_TOKEN',
  RAILWAY_ENVIRONMENT: 'RAILWAY_ENVIRONMENT',
  RAILWAY_PROJECT_ID: 'RAILWAY_PROJECT_ID',
  RUNNING_IN_DOCKER: 'RUNNING_IN_DOCKER',
  TARGET_URL: 'TARGET_URL',
  SCREENSHOT_DIR: 'SCREENSHOT_DIR',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;
