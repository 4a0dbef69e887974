import { SUPPORTED_BROWSERS, type BrowserName } from '../constants.js';
import { UnsupportedBrowserError } from '../errors.js';
import { createCdpBrowser } from './cdp.js';
import type { RemoteBrowser, RemoteBrowserOptions } from './types.js';
import { createWebDriverBrowser } from './webdriver.js';

export type { BrowserCapabilities, RemoteBrowser, RemoteBrowserFactory, RemoteBrowserOptions } from './types.js';

export function isSupportedBrowser(name: string): name is BrowserName {
  return SUPPORTED_BROWSERS.some((supported) => supported === name);
}

/**
 * Opens a remote browser session on the backend the remote URL calls for.
 * Unsupported browser names are rejected before anything touches the network.
 */
export async function createRemoteBrowser(options: RemoteBrowserOptions): Promise<RemoteBrowser> {
  if (!isSupportedBrowser(options.browser)) {
    throw new UnsupportedBrowserError(options.browser, SUPPORTED_BROWSERS);
  }

  return options.backend === 'cdp' ? createCdpBrowser(options) : createWebDriverBrowser(options);
}
