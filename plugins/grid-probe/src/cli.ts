#!/usr/bin/env node

/**
 * grid-probe CLI.
 *
 * Connects to the remote browser picked from the environment, visits the
 * test page, saves a screenshot under reports/, and exits non-zero on any
 * failure.
 *
 * Usage:
 *   SELENIUM_REMOTE_URL=http://localhost:4444 grid-probe
 *   SELENIUM_BROWSER=firefox grid-probe
 *   BROWSERLESS_TOKEN=... grid-probe
 */

import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { loadDotenv } from './config.js';
import { run } from './run.js';

// Resolve plugin root directory
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// dist/src/cli.js -> dist/src -> dist -> plugin-root
const PLUGIN_ROOT = resolve(__dirname, '..', '..');

// Load .env from the plugin root
loadDotenv(PLUGIN_ROOT);

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[grid-probe] Fatal error:', err);
    process.exitCode = 1;
  });
