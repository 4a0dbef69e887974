import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import sharp from 'sharp';
import { vi } from 'vitest';
import type { BrowserCapabilities, RemoteBrowser } from '../src/drivers/index.js';
import { createLogger } from '../src/logger.js';

export const TEST_PAGE_SOURCE = '<html><body><h1>Test</h1></body></html>';

export function silentLogger() {
  return createLogger('debug', { colors: false, silent: true });
}

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'grid-probe-'));
}

export function solidPng(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 255, g: 255, b: 255 } },
  })
    .png()
    .toBuffer();
}

/**
 * In-memory stand-in for a remote browser session.
 */
export function createFakeBrowser(png: Buffer = Buffer.alloc(0)) {
  return {
    getCapabilities: vi.fn(
      async (): Promise<BrowserCapabilities> => ({ browserName: 'chrome', browserVersion: '120.0.0.0' }),
    ),
    navigate: vi.fn(async (_url: string): Promise<void> => undefined),
    waitForElement: vi.fn(async (_selector: string, _timeoutMs: number): Promise<void> => undefined),
    getTitle: vi.fn(async () => 'Test Page'),
    getPageSource: vi.fn(async () => TEST_PAGE_SOURCE),
    getCurrentUrl: vi.fn(async () => 'https://httpbin.org/html'),
    getElementText: vi.fn(async (_selector: string) => 'Test Header'),
    screenshot: vi.fn(async () => png),
    quit: vi.fn(async (): Promise<void> => undefined),
  } satisfies RemoteBrowser;
}

export type FakeBrowser = ReturnType<typeof createFakeBrowser>;
