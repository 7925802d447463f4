/**
 * PolicyConfig construction -- the immutable tables the engine consults.
 *
 * Defaults cover what a Node.js coding agent needs: file inspection,
 * minimal file manipulation, version control, Node tooling and process
 * listing. Anything destructive or network-facing is absent on purpose.
 */

import type { PolicyConfig } from '@shellgate/core';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_ALLOWED_COMMANDS: readonly string[] = [
  // File inspection
  'ls',
  'cat',
  'head',
  'tail',
  'wc',
  'grep',
  // File operations
  'cp',
  'mkdir',
  'chmod',
  // Directory
  'pwd',
  // Node.js
  'npm',
  'npx',
  'node',
  // Version control
  'git',
  // Process management
  'ps',
  'lsof',
  'sleep',
  'pkill',
] as const;

/** Processes a development session may legitimately need to stop. */
export const DEFAULT_DEV_PROCESSES: readonly string[] = ['node', 'npm', 'npx', 'vite', 'next'] as const;

export const DEFAULT_INIT_SCRIPT = 'init.sh';

export const DEFAULT_SHELL_TOOLS: readonly string[] = ['Bash'] as const;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface PolicyOptions {
  allowedCommands?: Iterable<string>;
  devProcesses?: Iterable<string>;
  initScript?: string;
  shellTools?: Iterable<string>;
}

/**
 * Build a frozen PolicyConfig. Each set is copied so later changes to the
 * caller's collections cannot leak into a running engine.
 */
export function createPolicyConfig(options: PolicyOptions = {}): PolicyConfig {
  return Object.freeze({
    allowedCommands: new Set(options.allowedCommands ?? DEFAULT_ALLOWED_COMMANDS),
    devProcesses: new Set(options.devProcesses ?? DEFAULT_DEV_PROCESSES),
    initScript: options.initScript ?? DEFAULT_INIT_SCRIPT,
    shellTools: new Set(options.shellTools ?? DEFAULT_SHELL_TOOLS),
  });
}
