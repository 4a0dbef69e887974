/**
 * Environment-aware configuration.
 *
 * Picks the remote browser endpoint from the deployment the probe runs in
 * (Railway, Docker Compose, a hosted Browserless Chrome, or a local Grid),
 * unless an explicit URL is given. Shared by the CLI and library callers.
 */

import { join } from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_BROWSER,
  DEFAULT_REMOTE_URL_BROWSERLESS,
  DEFAULT_REMOTE_URL_DOCKER,
  DEFAULT_REMOTE_URL_LOCAL,
  DEFAULT_SCREENSHOT_DIR,
  DEFAULT_TIMEOUT_SECONDS,
  ENV,
  GRID_HUB_PATH,
  TEST_URL,
} from './constants.js';
import { ConfigurationError } from './errors.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type DriverBackend = 'webdriver' | 'cdp';
export type DeploymentEnvironment = 'railway' | 'docker' | 'browserless' | 'local';

export interface ProbeConfig {
  /** Lower-cased; checked against the supported set when connecting. */
  browser: string;
  remoteUrl: string;
  backend: DriverBackend;
  environment: DeploymentEnvironment;
  timeoutMs: number;
  targetUrl: string;
  screenshotDir: string;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

const envSchema = z.object({
  [ENV.BROWSER]: z.string().trim().toLowerCase().min(1).optional(),
  [ENV.REMOTE_URL]: z.string().url().optional(),
  [ENV.HUB_URL]: z.string().url().optional(),
  [ENV.TIMEOUT]: z.coerce.number().positive().optional(),
  [ENV.BROWSERLESS_TOKEN]: z.string().optional(),
  [ENV.RAILWAY_ENVIRONMENT]: z.string().optional(),
  [ENV.RAILWAY_PROJECT_ID]: z.string().optional(),
  [ENV.RUNNING_IN_DOCKER]: z.string().optional(),
  [ENV.TARGET_URL]: z.string().url().optional(),
  [ENV.SCREENSHOT_DIR]: z.string().optional(),
  [ENV.LOG_LEVEL]: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
});

type ParsedEnv = z.infer<typeof envSchema>;

/**
 * Copies the variables the probe reads, dropping empty strings so that
 * `FOO=` in a .env file behaves like an unset variable.
 */
function pickEnv(env: Env): Env {
  const picked: Env = {};
  for (const key of Object.values(ENV)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      picked[key] = value;
    }
  }
  return picked;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true'].includes(value.trim().toLowerCase());
}

export function detectEnvironment(env: Env): DeploymentEnvironment {
  const picked = pickEnv(env);
  if (picked[ENV.BROWSERLESS_TOKEN]) return 'browserless';
  if (picked[ENV.RAILWAY_ENVIRONMENT] || picked[ENV.RAILWAY_PROJECT_ID]) return 'railway';
  if (isTruthy(picked[ENV.RUNNING_IN_DOCKER])) return 'docker';
  return 'local';
}

export function resolveRemoteUrl(env: Env, environment: DeploymentEnvironment): string {
  const picked = pickEnv(env);
  const explicit = picked[ENV.REMOTE_URL] ?? picked[ENV.HUB_URL];
  if (explicit) {
    return explicit;
  }

  switch (environment) {
    case 'browserless': {
      const token = picked[ENV.BROWSERLESS_TOKEN] ?? '';
      return `${DEFAULT_REMOTE_URL_BROWSERLESS}?token=${encodeURIComponent(token)}`;
    }
    case 'railway':
    case 'docker':
      return DEFAULT_REMOTE_URL_DOCKER;
    case 'local':
      return DEFAULT_REMOTE_URL_LOCAL;
  }
}

/** WebSocket endpoints speak CDP; everything else is a WebDriver hub. */
export function backendForUrl(remoteUrl: string): DriverBackend {
  const { protocol } = new URL(remoteUrl);
  return protocol === 'ws:' || protocol === 'wss:' ? 'cdp' : 'webdriver';
}

/**
 * The WebDriver command endpoint for a hub URL.
 * `http://localhost:4444` becomes `http://localhost:4444/wd/hub`.
 */
export function gridEndpoint(remoteUrl: string): string {
  const trimmed = remoteUrl.replace(/\/+$/, '');
  return trimmed.endsWith(GRID_HUB_PATH) ? trimmed : `${trimmed}${GRID_HUB_PATH}`;
}

/** The Grid console (web UI) for a hub URL. */
export function gridConsoleUrl(remoteUrl: string): string {
  const trimmed = remoteUrl.replace(/\/+$/, '');
  return trimmed.endsWith(GRID_HUB_PATH) ? trimmed.slice(0, -GRID_HUB_PATH.length) : trimmed;
}

/** Hides the value of a `token` query parameter for display. */
export function redactUrl(remoteUrl: string): string {
  if (!remoteUrl.includes('token=')) {
    return remoteUrl;
  }
  if (!URL.canParse(remoteUrl)) {
    return remoteUrl.replace(/token=[^&#]*/g, 'token=***');
  }
  const url = new URL(remoteUrl);
  url.searchParams.set('token', '***');
  return url.toString();
}

function parseEnv(env: Env): ParsedEnv {
  const result = envSchema.safeParse(pickEnv(env));
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Builds the probe configuration from environment variables.
 * Throws ConfigurationError when a variable is set to an invalid value.
 */
export function loadConfig(env: Env = process.env): ProbeConfig {
  const parsed = parseEnv(env);
  const environment = detectEnvironment(env);
  const remoteUrl = resolveRemoteUrl(env, environment);

  return {
    browser: parsed[ENV.BROWSER] ?? DEFAULT_BROWSER,
    remoteUrl,
    backend: backendForUrl(remoteUrl),
    environment,
    timeoutMs: (parsed[ENV.TIMEOUT] ?? DEFAULT_TIMEOUT_SECONDS) * 1000,
    targetUrl: parsed[ENV.TARGET_URL] ?? TEST_URL,
    screenshotDir: parsed[ENV.SCREENSHOT_DIR] ?? DEFAULT_SCREENSHOT_DIR,
    logLevel: parsed[ENV.LOG_LEVEL] ?? 'info',
  };
}

/**
 * Load .env from the plugin root. Variables already present in the
 * environment are left alone.
 */
export function loadDotenv(pluginRoot: string): void {
  dotenv.config({ path: join(pluginRoot, '.env') });
}
