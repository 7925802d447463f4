/**
 * Policy command -- print the effective allowlists after config merging.
 */

import type { ShellgateConfig } from '@shellgate/core';

import { configExists, getConfigPath, loadConfig } from '../config.js';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const RED = '\x1b[31m';

function list(values: readonly string[]): string {
  return values.length > 0 ? [...values].sort().join(' ') : `${DIM}(none)${RESET}`;
}

export function formatPolicy(config: ShellgateConfig, source: string): string[] {
  const { policy, observability } = config;
  return [
    '',
    `  ${CYAN}${BOLD}shellgate policy${RESET}`,
    `  ${DIM}${'='.repeat(50)}${RESET}`,
    `  ${BOLD}Source${RESET}          ${source}`,
    `  ${BOLD}Shell tools${RESET}     ${list(policy.shellTools)}`,
    `  ${BOLD}Allowed${RESET}         ${list(policy.allowedCommands)}`,
    `  ${BOLD}Dev processes${RESET}   ${list(policy.devProcesses)}`,
    `  ${BOLD}Init script${RESET}     ${policy.initScript}`,
    `  ${BOLD}Observers${RESET}       ${list(observability.observers)} ${DIM}(level ${observability.logLevel})${RESET}`,
    '',
  ];
}

export async function policy(_args: string[]): Promise<void> {
  let config;
  try {
    config = loadConfig();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${message}\n`);
    process.exitCode = 1;
    return;
  }

  const source = configExists() ? getConfigPath() : 'built-in defaults';
  for (const line of formatPolicy(config, source)) {
    console.log(line);
  }
}
