import { describe, expect, it } from 'vitest';
import { printBanner, printFailure, printResult, vncUrl } from '../src/banner.js';
import type { ProbeConfig } from '../src/config.js';
import type { ScrapeResult } from '../src/scraper.js';

const gridConfig: ProbeConfig = {
  browser: 'chrome',
  remoteUrl: 'http://localhost:4444',
  backend: 'webdriver',
  environment: 'local',
  timeoutMs: 10000,
  targetUrl: 'https://httpbin.org/html',
  screenshotDir: 'reports',
  logLevel: 'info',
};

const cdpConfig: ProbeConfig = {
  ...gridConfig,
  remoteUrl: 'wss://chrome.browserless.io?token=test-token',
  backend: 'cdp',
  environment: 'browserless',
};

const result: ScrapeResult = {
  status: 'success',
  title: 'Test',
  h1Text: 'Header',
  pageSourceLength: '100',
  url: 'https://test.com',
  browserName: 'firefox',
  browserVersion: '119.0',
  executionMode: 'selenium_grid',
};

function collect(): { lines: string[]; out: (line: string) => void } {
  const lines: string[] = [];
  return { lines, out: (line) => lines.push(line) };
}

describe('vncUrl', () => {
  it('uses the per-browser port', () => {
    expect(vncUrl('chrome')).toBe('http://localhost:7900');
    expect(vncUrl('firefox')).toBe('http://localhost:7901');
    expect(vncUrl('edge')).toBe('http://localhost:7900');
  });
});

describe('printBanner', () => {
  it('shows the Grid connection details', () => {
    const { lines, out } = collect();
    printBanner({ ...gridConfig, remoteUrl: 'http://test:4444/wd/hub', browser: 'firefox' }, out);

    expect(lines).toEqual([
      '🚀 grid-probe - Selenium Remote WebDriver',
      '='.repeat(60),
      'Remote URL: http://test:4444/wd/hub',
      'Browser: firefox',
      'Backend: webdriver',
      'Environment: local',
      'Grid Web UI: http://test:4444',
      'VNC Viewer: http://localhost:7901',
      '-'.repeat(60),
    ]);
  });

  it('hides the token and Grid-only lines for CDP', () => {
    const { lines, out } = collect();
    printBanner(cdpConfig, out);

    expect(lines).toEqual([
      '🚀 grid-probe - Selenium Remote WebDriver',
      '='.repeat(60),
      'Remote URL: wss://chrome.browserless.io/?token=***',
      'Browser: chrome',
      'Backend: cdp',
      'Environment: browserless',
      '-'.repeat(60),
    ]);
  });
});

describe('printResult', () => {
  it('lists the scraped fields and the screenshot', () => {
    const { lines, out } = collect();
    printResult(result, 'reports/test_firefox_screenshot.png', { ...gridConfig, browser: 'firefox' }, out);

    expect(lines).toEqual([
      '✅ Status: success',
      '📄 Title: Test',
      '📝 H1 Text: Header',
      '📊 Page source length: 100',
      '🔗 URL: https://test.com',
      '🌐 Browser: firefox 119.0',
      '⚙️  Mode: selenium_grid',
      '📸 Screenshot: reports/test_firefox_screenshot.png',
      '',
      '🎉 Remote browser test completed successfully!',
      '',
      '🔍 To watch the browser in action:',
      '   Open http://localhost:7901 in your browser',
      '   Password: secret',
    ]);
  });

  it('omits the screenshot line and VNC hints when not applicable', () => {
    const { lines, out } = collect();
    printResult({ ...result, executionMode: 'browserless_cdp' }, null, cdpConfig, out);

    expect(lines.some((line) => line.startsWith('📸'))).toBe(false);
    expect(lines[lines.length - 1]).toBe('🎉 Remote browser test completed successfully!');
  });
});

describe('printFailure', () => {
  it('points at the Grid status page', () => {
    const { lines, out } = collect();
    printFailure('Driver failed', gridConfig, out);

    expect(lines).toEqual([
      '❌ Application failed: Driver failed',
      '',
      '🔧 Troubleshooting:',
      '- Check if Selenium Grid is running (docker compose up)',
      '- Verify Grid status at http://localhost:4444/status',
      '- Check if the specified browser node is available',
      '- Ensure proper network connectivity',
    ]);
  });

  it('mentions the token for CDP endpoints', () => {
    const { lines, out } = collect();
    printFailure('socket hang up', cdpConfig, out);

    expect(lines[4]).toBe(
      '- Verify BROWSERLESS_TOKEN and that wss://chrome.browserless.io/?token=*** accepts CDP connections',
    );
  });

  it('works without a configuration', () => {
    const { lines, out } = collect();
    printFailure('Invalid configuration', null, out);

    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('❌ Application failed: Invalid configuration');
  });
});
