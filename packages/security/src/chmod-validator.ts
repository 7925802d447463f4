/**
 * chmod validation -- only `+x` on explicit targets.
 *
 * Agents need to mark scripts executable and nothing more. Revoking bits,
 * setting absolute modes, octal modes, permissions other than execute and
 * recursion are all rejected.
 */

import type { CommandValidation } from '@shellgate/core';

import { parseInvocation } from './invocation.js';

/** Optional who-set followed by exactly `+x`. */
const EXECUTE_ONLY_MODE = /^[ugoa]*\+x$/;

/** Anything chmod itself would parse as a mode. */
const MODE_LIKE = /^(?:[0-7]{1,4}|[ugoa]*[-+=][rwxXst]*(?:,[ugoa]*[-+=][rwxXst]*)*)$/;

function isRecursiveFlag(arg: string): boolean {
  return arg === '--recursive' || /^-[A-Za-z]*R[A-Za-z]*$/.test(arg);
}

export function validateChmodArgs(args: readonly string[]): CommandValidation {
  if (args.some(isRecursiveFlag)) {
    return { allowed: false, reason: 'recursive chmod not allowed' };
  }

  const longOption = args.find((arg) => arg.startsWith('--'));
  if (longOption !== undefined) {
    return { allowed: false, reason: `chmod option not allowed: ${longOption}` };
  }

  const [mode, ...targets] = args;
  if (mode === undefined) {
    return { allowed: false, reason: 'missing chmod mode' };
  }

  if (!EXECUTE_ONLY_MODE.test(mode)) {
    return { allowed: false, reason: `disallowed chmod mode: ${mode} (only +x is allowed)` };
  }

  if (targets.some((target) => MODE_LIKE.test(target))) {
    return { allowed: false, reason: 'only one chmod mode is allowed' };
  }

  if (targets.length === 0) {
    return { allowed: false, reason: 'missing target file' };
  }

  return { allowed: true };
}

/** Validate a full `chmod ...` command string. */
export function validateChmodCommand(command: string): CommandValidation {
  const invocation = parseInvocation(command);
  if (!invocation || invocation.program !== 'chmod') {
    return { allowed: false, reason: 'not a chmod command' };
  }
  return validateChmodArgs(invocation.args);
}
