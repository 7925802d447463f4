#!/usr/bin/env node
/**
 * shellgate CLI entry point.
 *
 * Usage:
 *   shellgate hook                      Read a hook request on stdin, answer on stdout
 *   shellgate check [--json] <cmd...>   Evaluate a command line
 *   shellgate policy                    Show the effective policy
 *   shellgate init [--force]            Write the default config
 */

import { check } from './commands/check.js';
import { hook } from './commands/hook.js';
import { init } from './commands/init.js';
import { policy } from './commands/policy.js';

const VERSION = '0.1.0';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const RED = '\x1b[31m';

type Command = (args: string[]) => Promise<void>;

const COMMANDS: Record<string, Command> = {
  hook,
  check,
  policy,
  init,
};

function printHelp(): void {
  console.log(`
  ${CYAN}${BOLD}shellgate${RESET} ${DIM}v${VERSION}${RESET}
  Pre-execution policy gate for agent shell commands.

  ${BOLD}Commands${RESET}
    hook                      Read a hook request on stdin, answer on stdout
    check [--json] <cmd...>   Evaluate a command line (exit 1 on block)
    policy                    Show the effective policy
    init [--force]            Write the default config to ~/.shellgate/config.json
`);
}

async function main(argv: string[]): Promise<void> {
  const [name, ...args] = argv;

  if (name === undefined || name === 'help' || name === '--help' || name === '-h') {
    printHelp();
    return;
  }
  if (name === 'version' || name === '--version' || name === '-v') {
    console.log(VERSION);
    return;
  }

  const command = COMMANDS[name];
  if (command === undefined) {
    console.error(`\n  ${RED}Unknown command:${RESET} ${name}`);
    console.error(`  ${DIM}Run ${CYAN}shellgate help${DIM} for usage.${RESET}\n`);
    process.exitCode = 1;
    return;
  }

  await command(args);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`${RED}[shellgate] fatal:${RESET} ${message}`);
  process.exitCode = 1;
});
