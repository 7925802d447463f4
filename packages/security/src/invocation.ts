/**
 * Invocation extraction -- resolve which program a sub-command runs.
 *
 * Tokenizes on unquoted whitespace (quotes are removed, escapes resolved),
 * drops leading `NAME=value` environment assignments, and reduces the
 * program token to its base name so allowlist checks are independent of
 * the directory it was invoked from.
 */

import type { Invocation } from '@shellgate/core';

import { ShellCommandSplitter } from './command-splitter.js';

const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/** Characters a backslash escapes inside double quotes. */
const DOUBLE_QUOTE_ESCAPABLE = new Set(['"', '\\', '$', '`']);

interface Word {
  text: string;
  /** Length of the leading part of `text` that was neither quoted nor escaped. */
  plainPrefix: number;
}

function scanWords(segment: string): Word[] {
  const words: Word[] = [];
  let current = '';
  let plainPrefix = Number.POSITIVE_INFINITY;
  let inToken = false;
  let quote: '"' | "'" | null = null;

  const markQuoted = (): void => {
    plainPrefix = Math.min(plainPrefix, current.length);
  };

  for (let i = 0; i < segment.length; i++) {
    const ch = segment.charAt(i);
    const next = segment.charAt(i + 1);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && DOUBLE_QUOTE_ESCAPABLE.has(next)) {
        current += next;
        i++;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '\\') {
      markQuoted();
      current += next;
      inToken = true;
      i++;
      continue;
    }

    if (ch === "'" || ch === '"') {
      markQuoted();
      quote = ch;
      inToken = true;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inToken) {
        words.push({ text: current, plainPrefix: Math.min(plainPrefix, current.length) });
        current = '';
        plainPrefix = Number.POSITIVE_INFINITY;
        inToken = false;
      }
      continue;
    }

    current += ch;
    inToken = true;
  }

  if (inToken) words.push({ text: current, plainPrefix: Math.min(plainPrefix, current.length) });
  return words;
}

/**
 * Split a sub-command into words. Only the quoting needed to keep an
 * argument like `'node server.js'` together is understood.
 */
export function tokenize(segment: string): string[] {
  return scanWords(segment).map((word) => word.text);
}

/**
 * Final path segment of a program reference.
 * e.g. `/usr/bin/node` -> `node`, `../dir/init.sh` -> `init.sh`
 */
export function baseName(token: string): string {
  const lastSlash = token.lastIndexOf('/');
  return lastSlash === -1 ? token : token.slice(lastSlash + 1);
}

export function isEnvAssignment(token: string): boolean {
  return ENV_ASSIGNMENT.test(token);
}

/** The shell only sees an assignment when `NAME=` itself is unquoted. */
function isAssignmentWord(word: Word): boolean {
  const match = ENV_ASSIGNMENT.exec(word.text);
  return match !== null && match[0].length <= word.plainPrefix;
}

/**
 * Parse one sub-command. Returns null when nothing but environment
 * assignments (or nothing at all) is left; callers treat that as a block.
 */
export function parseInvocation(segment: string): Invocation | null {
  const words = scanWords(segment);
  const tokens = words.map((word) => word.text);
  const index = words.findIndex((word) => !isAssignmentWord(word));
  const rawProgram = index === -1 ? undefined : tokens[index];
  if (rawProgram === undefined) return null;

  return {
    rawProgram,
    program: baseName(rawProgram),
    args: tokens.slice(index + 1),
    assignments: tokens.slice(0, index),
  };
}

const splitter = new ShellCommandSplitter();

/**
 * Base program names of every sub-command, in order. Returns an empty list
 * when the command cannot be split safely.
 */
export function extractCommands(command: string): string[] {
  const { segments, error } = splitter.split(command);
  if (error !== undefined) return [];

  const programs: string[] = [];
  for (const segment of segments) {
    const invocation = parseInvocation(segment);
    if (invocation) programs.push(invocation.program);
  }
  return programs;
}
