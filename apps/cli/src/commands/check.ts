/**
 * Check command -- evaluate a command line against the effective policy
 * without going through the hook protocol.
 *
 *   shellgate check git status && npm test
 *   shellgate check --json "pkill chrome"
 *
 * Exit code 0 on allow, 1 on block.
 */

import type { Decision, IDecisionEngine } from '@shellgate/core';
import { toHookResponse } from '@shellgate/security';

import { loadConfig } from '../config.js';
import { createRuntime } from '../runtime.js';

// ---------------------------------------------------------------------------
// ANSI color helpers
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatDecision(command: string, decision: Decision): string {
  if (decision.verdict === 'allow') {
    return `  ${GREEN}${BOLD}ALLOW${RESET}  ${command}`;
  }
  return `  ${RED}${BOLD}BLOCK${RESET}  ${command}\n         ${DIM}${decision.reason}${RESET}`;
}

/** Evaluate, print and return the exit code. */
export function runCheck(command: string, engine: IDecisionEngine, json: boolean): number {
  const decision = engine.evaluateCommand(command);
  console.log(json ? JSON.stringify(toHookResponse(decision)) : formatDecision(command, decision));
  return decision.verdict === 'allow' ? 0 : 1;
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

export async function check(args: string[]): Promise<void> {
  const json = args.includes('--json');
  const command = args.filter((arg) => arg !== '--json').join(' ');

  if (command.trim().length === 0) {
    console.error(`\n  ${RED}Missing command.${RESET} Usage: ${CYAN}shellgate check [--json] <command...>${RESET}\n`);
    process.exitCode = 1;
    return;
  }

  let config;
  try {
    config = loadConfig();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${message}\n`);
    process.exitCode = 1;
    return;
  }

  const { engine, observer } = createRuntime(config);
  process.exitCode = runCheck(command, engine, json);
  await observer.flush?.();
}
