/**
 * CommandAllowlist -- program allowlist membership
 *
 * Only explicitly allowed programs may be executed. Membership is an exact
 * match on the base name; arguments of ordinary allowlisted programs are
 * not inspected.
 */

import type { CommandValidation, Invocation } from '@shellgate/core';

import { DEFAULT_ALLOWED_COMMANDS, DEFAULT_INIT_SCRIPT } from './policy-config.js';
import { baseName } from './invocation.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface CommandAllowlistConfig {
  /**
   * Programs that may be executed. If not provided, the default set is
   * used (git, npm, node, etc.).
   */
  allowedCommands?: Iterable<string>;

  /** Script name that may be run by path; used in block reasons. */
  initScript?: string;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export class CommandAllowlist {
  private readonly allowedCommands: ReadonlySet<string>;
  private readonly initScript: string;

  constructor(config: CommandAllowlistConfig = {}) {
    this.allowedCommands = new Set(config.allowedCommands ?? DEFAULT_ALLOWED_COMMANDS);
    this.initScript = config.initScript ?? DEFAULT_INIT_SCRIPT;
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /** Check a program against the allowlist. Path prefixes are ignored. */
  isAllowed(program: string): boolean {
    return this.allowedCommands.has(baseName(program));
  }

  validate(invocation: Invocation): CommandValidation {
    if (this.isAllowed(invocation.program)) {
      return { allowed: true };
    }

    // A script run by path that is not the init script.
    if (invocation.rawProgram.includes('/') && invocation.program.endsWith('.sh')) {
      return {
        allowed: false,
        reason: `Script "${invocation.program}" is not allowed; only ${this.initScript} may be executed`,
      };
    }

    return {
      allowed: false,
      reason: `Command "${invocation.program || invocation.rawProgram}" is not in the allowlist`,
    };
  }

  /** Get the current allowlist as an immutable copy. */
  getAllowedCommands(): ReadonlySet<string> {
    return new Set(this.allowedCommands);
  }
}
