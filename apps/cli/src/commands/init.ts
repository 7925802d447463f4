/**
 * Init command -- write the default config to ~/.shellgate/config.json.
 *
 * An existing file is left alone unless `--force` is given.
 */

import { configExists, getConfigPath, getDefaultConfig, saveConfig } from '../config.js';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';

export async function init(args: string[]): Promise<void> {
  const force = args.includes('--force');

  if (configExists() && !force) {
    console.log(`\n  ${YELLOW}Config already exists:${RESET} ${getConfigPath()}`);
    console.log(`  ${DIM}Run ${CYAN}shellgate init --force${DIM} to overwrite it.${RESET}\n`);
    return;
  }

  try {
    saveConfig(getDefaultConfig());
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to write config:${RESET} ${message}\n`);
    process.exitCode = 1;
    return;
  }

  console.log(`\n  ${GREEN}Wrote default config:${RESET} ${getConfigPath()}\n`);
}
