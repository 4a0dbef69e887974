import { gridConsoleUrl, redactUrl, type ProbeConfig } from './config.js';
import { APP_TITLE, BANNER_LENGTH, ENV, VNC_PASSWORD, VNC_PORTS } from './constants.js';
import { isSupportedBrowser } from './drivers/index.js';
import type { ScrapeResult } from './scraper.js';

export type Printer = (line: string) => void;

const defaultPrinter: Printer = (line) => console.log(line);

export function vncUrl(browser: string): string {
  const port = isSupportedBrowser(browser) ? VNC_PORTS[browser] : VNC_PORTS.chrome;
  return `http://localhost:${port}`;
}

export function printBanner(config: ProbeConfig, out: Printer = defaultPrinter): void {
  out(APP_TITLE);
  out('='.repeat(BANNER_LENGTH));
  out(`Remote URL: ${redactUrl(config.remoteUrl)}`);
  out(`Browser: ${config.browser}`);
  out(`Backend: ${config.backend}`);
  out(`Environment: ${config.environment}`);
  if (config.backend === 'webdriver') {
    out(`Grid Web UI: ${gridConsoleUrl(config.remoteUrl)}`);
    out(`VNC Viewer: ${vncUrl(config.browser)}`);
  }
  out('-'.repeat(BANNER_LENGTH));
}

export function printResult(
  result: ScrapeResult,
  screenshotPath: string | null,
  config: ProbeConfig,
  out: Printer = defaultPrinter,
): void {
  out(`✅ Status: ${result.status}`);
  out(`📄 Title: ${result.title}`);
  out(`📝 H1 Text: ${result.h1Text}`);
  out(`📊 Page source length: ${result.pageSourceLength}`);
  out(`🔗 URL: ${result.url}`);
  out(`🌐 Browser: ${result.browserName} ${result.browserVersion}`);
  out(`⚙️  Mode: ${result.executionMode}`);
  if (screenshotPath) {
    out(`📸 Screenshot: ${screenshotPath}`);
  }
  out('');
  out('🎉 Remote browser test completed successfully!');

  if (config.backend === 'webdriver') {
    out('');
    out('🔍 To watch the browser in action:');
    out(`   Open ${vncUrl(config.browser)} in your browser`);
    out(`   Password: ${VNC_PASSWORD}`);
  }
}

export function printFailure(message: string, config: ProbeConfig | null, out: Printer = defaultPrinter): void {
  out(`❌ Application failed: ${message}`);
  out('');
  out('🔧 Troubleshooting:');
  out('- Check if Selenium Grid is running (docker compose up)');
  if (config?.backend === 'cdp') {
    out(`- Verify ${ENV.BROWSERLESS_TOKEN} and that ${redactUrl(config.remoteUrl)} accepts CDP connections`);
  } else if (config) {
    out(`- Verify Grid status at ${gridConsoleUrl(config.remoteUrl)}/status`);
  }
  out('- Check if the specified browser node is available');
  out('- Ensure proper network connectivity');
}
