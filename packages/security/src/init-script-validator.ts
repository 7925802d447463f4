/**
 * Init script validation -- the project's setup script may only be run
 * directly by path (`./init.sh`, `/abs/init.sh`, `../dir/init.sh`), never
 * handed to an interpreter.
 */

import type { CommandValidation, Invocation } from '@shellgate/core';

import { ShellCommandSplitter } from './command-splitter.js';
import { baseName, parseInvocation } from './invocation.js';
import { DEFAULT_INIT_SCRIPT } from './policy-config.js';

/** Programs that would execute a script handed to them as an argument. */
export const SCRIPT_INTERPRETERS: ReadonlySet<string> = new Set([
  'bash',
  'sh',
  'zsh',
  'dash',
  'ksh',
  'fish',
  'source',
  '.',
]);

/** True for a path reference (contains `/`) whose base name is the script. */
export function isInitScriptPath(token: string, initScript: string = DEFAULT_INIT_SCRIPT): boolean {
  return token.includes('/') && baseName(token) === initScript;
}

/** True when the script is passed to an interpreter instead of being run. */
export function isInterpretedInitScript(
  invocation: Invocation,
  initScript: string = DEFAULT_INIT_SCRIPT,
): boolean {
  return (
    SCRIPT_INTERPRETERS.has(invocation.program) &&
    invocation.args.some((arg) => baseName(arg) === initScript)
  );
}

export class InitScriptValidator {
  constructor(private readonly initScript: string = DEFAULT_INIT_SCRIPT) {}

  /** Arguments after the script path are not inspected. */
  validate(invocation: Invocation): CommandValidation {
    if (isInitScriptPath(invocation.rawProgram, this.initScript)) {
      return { allowed: true };
    }

    if (isInterpretedInitScript(invocation, this.initScript)) {
      return {
        allowed: false,
        reason: `${this.initScript} must be executed directly, not via an interpreter`,
      };
    }

    return {
      allowed: false,
      reason: `script not ${this.initScript}: "${invocation.rawProgram}"`,
    };
  }
}

const splitter = new ShellCommandSplitter();

/**
 * Validate a whole command string as an init script run. Every
 * sub-command must be a direct execution of the script; the first one
 * that is not decides the reason.
 */
export function validateInitScript(
  command: string,
  initScript: string = DEFAULT_INIT_SCRIPT,
): CommandValidation {
  const { segments, error } = splitter.split(command);
  if (error !== undefined) {
    return { allowed: false, reason: error };
  }
  if (segments.length === 0) {
    return { allowed: false, reason: 'no command found' };
  }

  const validator = new InitScriptValidator(initScript);
  for (const segment of segments) {
    const invocation = parseInvocation(segment);
    if (!invocation) {
      return { allowed: false, reason: 'no command found' };
    }
    const result = validator.validate(invocation);
    if (!result.allowed) return result;
  }

  return { allowed: true };
}
