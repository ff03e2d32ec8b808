/**
 * Startup checks for the external pieces a harvest needs
 */

import fs from 'fs';
import type { HarvesterConfig } from '../types';

/**
 * Resolves the browser binary from the config or PUPPETEER_EXECUTABLE_PATH
 */
export function resolveBrowserExecutable(config: HarvesterConfig, env: NodeJS.ProcessEnv = process.env): string | null {
  return config.browser.executablePath || env.PUPPETEER_EXECUTABLE_PATH || null;
}

export function checkBrowserAvailable(executablePath: string | null): boolean {
  if (!executablePath) {
    console.error('✗ No browser executable configured');
    console.error('  Set browser.executablePath in harvester.config.json or PUPPETEER_EXECUTABLE_PATH');
    return false;
  }
  if (!fs.existsSync(executablePath)) {
    console.error(`✗ Browser executable not found: ${executablePath}`);
    return false;
  }
  console.log(`✓ Browser executable: ${executablePath}`);
  return true;
}

/**
 * Check all critical dependencies
 */
export function checkAllDependencies(config: HarvesterConfig): boolean {
  console.log('\n--- Checking Dependencies ---');

  if (!checkBrowserAvailable(resolveBrowserExecutable(config))) {
    console.error('\n❌ CRITICAL: Missing required dependencies');
    console.error('A Chrome or Chromium binary is required to render object pages');
    return false;
  }

  console.log('\n✓ All dependencies are available\n');
  return true;
}
