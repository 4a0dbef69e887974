import { beforeEach, describe, expect, it, vi } from 'vitest';
import { UnsupportedBrowserError } from '../src/errors.js';

vi.mock('../src/drivers/webdriver.js', () => ({ createWebDriverBrowser: vi.fn() }));
vi.mock('../src/drivers/cdp.js', () => ({ createCdpBrowser: vi.fn() }));

const { createRemoteBrowser, isSupportedBrowser } = await import('../src/drivers/index.js');
const { createWebDriverBrowser } = await import('../src/drivers/webdriver.js');
const { createCdpBrowser } = await import('../src/drivers/cdp.js');

describe('isSupportedBrowser', () => {
  it('knows chrome and firefox', () => {
    expect(isSupportedBrowser('chrome')).toBe(true);
    expect(isSupportedBrowser('firefox')).toBe(true);
    expect(isSupportedBrowser('edge')).toBe(false);
    expect(isSupportedBrowser('Chrome')).toBe(false);
  });
});

describe('createRemoteBrowser', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('dispatches to the WebDriver backend', async () => {
    const options = { browser: 'firefox', remoteUrl: 'http://localhost:4444', backend: 'webdriver', timeoutMs: 1 } as const;
    await createRemoteBrowser(options);

    expect(createWebDriverBrowser).toHaveBeenCalledWith(options);
    expect(createCdpBrowser).not.toHaveBeenCalled();
  });

  it('dispatches to the CDP backend', async () => {
    const options = { browser: 'chrome', remoteUrl: 'ws://localhost:3000', backend: 'cdp', timeoutMs: 1 } as const;
    await createRemoteBrowser(options);

    expect(createCdpBrowser).toHaveBeenCalledWith(options);
    expect(createWebDriverBrowser).not.toHaveBeenCalled();
  });

  it('rejects unsupported browsers before either backend runs', async () => {
    await expect(
      createRemoteBrowser({ browser: 'edge', remoteUrl: 'http://localhost:4444', backend: 'webdriver', timeoutMs: 1 }),
    ).rejects.toThrow("Unsupported browser: edge. Use 'chrome', 'firefox'");
    await expect(
      createRemoteBrowser({ browser: 'safari', remoteUrl: 'http://localhost:4444', backend: 'webdriver', timeoutMs: 1 }),
    ).rejects.toBeInstanceOf(UnsupportedBrowserError);
    expect(createWebDriverBrowser).not.toHaveBeenCalled();
    expect(createCdpBrowser).not.toHaveBeenCalled();
  });
});
