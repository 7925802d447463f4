/**
 * ShellCommandSplitter -- composite command splitting
 *
 * Breaks a raw command string into sub-commands at top-level composition
 * operators (`&&`, `||`, `|`, `;`, plus a lone `&`, `|&` and newlines).
 * Quote tracking is deliberately minimal: single and double quotes and
 * backslash escapes are honoured so that operators inside quoted arguments
 * do not split. Anything the splitter cannot see through (command or
 * process substitution, ANSI-C `$'...'` quoting, an unterminated quote) is
 * reported as an error so the engine can block it.
 */

import type { ICommandSplitter, SplitResult } from '@shellgate/core';

// ---------------------------------------------------------------------------
// Error reasons
// ---------------------------------------------------------------------------

export const UNBALANCED_QUOTES = 'unbalanced quotes in command';
export const COMMAND_SUBSTITUTION = 'command substitution is not allowed';
export const PROCESS_SUBSTITUTION = 'process substitution is not allowed';
export const ANSI_C_QUOTING = 'ANSI-C quoting is not allowed';

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export class ShellCommandSplitter implements ICommandSplitter {
  split(command: string): SplitResult {
    const segments: string[] = [];
    let current = '';
    let quote: '"' | "'" | null = null;

    const push = (): void => {
      const trimmed = current.trim();
      if (trimmed.length > 0) {
        segments.push(trimmed);
      }
      current = '';
    };

    for (let i = 0; i < command.length; i++) {
      const ch = command.charAt(i);
      const next = command.charAt(i + 1);

      // Single quotes: everything is literal until the closing quote.
      if (quote === "'") {
        current += ch;
        if (ch === "'") quote = null;
        continue;
      }

      if (ch === '\\') {
        current += ch + next;
        i++;
        continue;
      }

      if (ch === '`' || (ch === '$' && next === '(')) {
        return { segments: [], error: COMMAND_SUBSTITUTION };
      }

      if (quote === '"') {
        current += ch;
        if (ch === '"') quote = null;
        continue;
      }

      // ---- Unquoted ----

      // `$'...'` honours `\'` inside, which plain single quotes do not.
      if (ch === '$' && next === "'") {
        return { segments: [], error: ANSI_C_QUOTING };
      }

      if (ch === "'" || ch === '"') {
        quote = ch;
        current += ch;
        continue;
      }

      if ((ch === '<' || ch === '>') && next === '(') {
        return { segments: [], error: PROCESS_SUBSTITUTION };
      }

      if (ch === ';' || ch === '\n') {
        push();
        continue;
      }

      if (ch === '|') {
        push();
        // `||` and `|&` are single operators.
        if (next === '|' || next === '&') i++;
        continue;
      }

      if (ch === '&') {
        if (next === '&') {
          push();
          i++;
          continue;
        }
        // `2>&1`, `<&3` and `&>file` are redirections, not job control.
        const prev = current.charAt(current.length - 1);
        if (prev === '>' || prev === '<' || next === '>') {
          current += ch;
          continue;
        }
        push();
        continue;
      }

      current += ch;
    }

    if (quote !== null) {
      return { segments: [], error: UNBALANCED_QUOTES };
    }

    push();
    return { segments };
  }
}

const defaultSplitter = new ShellCommandSplitter();

/** Split with the default splitter, returning no segments on error. */
export function splitCommands(command: string): string[] {
  return defaultSplitter.split(command).segments;
}
