/**
 * ConsoleObserver -- structured console logging with ANSI color coding.
 *
 * Formats gate events as human-readable lines, respecting the configured
 * log level. Everything goes to stderr: stdout belongs to the hook
 * protocol and must only ever carry the JSON response.
 */

import type { IObserver, DecisionEvent, SecurityEvent, LogLevel } from '@shellgate/core';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Security event severity mapping
// ---------------------------------------------------------------------------

type Severity = 'low' | 'medium' | 'high';

const SECURITY_SEVERITY: Record<SecurityEvent['type'], Severity> = {
  malformed_input: 'low',
  command_blocked: 'medium',
  unsafe_syntax: 'high',
};

const SEVERITY_COLOR: Record<Severity, string> = {
  low: FG.gray,
  medium: FG.yellow,
  high: `${BOLD}${FG.red}`,
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'warn') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  // ---- IObserver ----------------------------------------------------------

  /** Allows log at debug, blocks at info. */
  onDecision(event: DecisionEvent): void {
    const blocked = event.verdict === 'block';
    if (!this.shouldLog(blocked ? 'info' : 'debug')) return;
    const ts = this.timestamp();
    const verdict = blocked ? `${FG.red}BLOCK${RESET}` : `${FG.green}ALLOW${RESET}`;
    console.error(
      `${DIM}${ts}${RESET} ${this.tag('GATE', FG.magenta)} ${verdict}` +
        ` ${DIM}tool=${RESET}${event.toolName || '?'}` +
        (event.command !== undefined ? ` ${DIM}command=${RESET}${JSON.stringify(event.command)}` : '') +
        (blocked ? ` ${DIM}reason=${RESET}${event.reason}` : '') +
        ` ${DIM}duration=${RESET}${event.duration}ms`,
    );
  }

  onSecurityEvent(event: SecurityEvent): void {
    if (!this.shouldLog('warn')) return;
    const ts = this.timestamp();
    const severity = SECURITY_SEVERITY[event.type];
    console.warn(
      `${DIM}${ts}${RESET} ${this.tag('SECURITY', FG.red)} ${SEVERITY_COLOR[severity]}[${severity.toUpperCase()}]${RESET}` +
        ` ${BOLD}${event.type}${RESET}` +
        ` ${DIM}details=${RESET}${JSON.stringify(event.details)}`,
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ts = this.timestamp();
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}ctx=${RESET}${JSON.stringify(context)}` : '';
    console.error(
      `${DIM}${ts}${RESET} ${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}: ${error.message}${ctx}`,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
