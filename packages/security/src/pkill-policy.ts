/**
 * PkillPolicy -- process termination restricted to dev processes.
 *
 * Flags are ignored (`-f` only switches pkill to full command-line
 * matching); the single remaining target must name one of the configured
 * development processes. For `-f` patterns such as `'node server.js'` the
 * first word of the pattern is what gets checked, as an exact name: the
 * pattern is a regular expression, so `chrome|/node` must not pass as `node`.
 */

import type { CommandValidation } from '@shellgate/core';

import { DEFAULT_DEV_PROCESSES } from './policy-config.js';

export class PkillPolicy {
  private readonly devProcesses: ReadonlySet<string>;

  constructor(devProcesses: Iterable<string> = DEFAULT_DEV_PROCESSES) {
    this.devProcesses = new Set(devProcesses);
  }

  validate(args: readonly string[]): CommandValidation {
    const targets = args.filter((arg) => !arg.startsWith('-'));

    const [target] = targets;
    if (target === undefined) {
      return { allowed: false, reason: 'pkill requires a target process name' };
    }
    if (targets.length > 1) {
      return { allowed: false, reason: 'pkill accepts a single target pattern' };
    }

    const [processName = ''] = target.trim().split(/\s+/);
    if (this.devProcesses.has(processName)) {
      return { allowed: true };
    }

    return {
      allowed: false,
      reason: `process termination target not in dev-process allowlist: "${target}"`,
    };
  }

  getDevProcesses(): ReadonlySet<string> {
    return new Set(this.devProcesses);
  }
}
