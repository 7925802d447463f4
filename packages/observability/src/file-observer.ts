/**
 * FileObserver -- JSONL audit log of gate decisions.
 *
 * One JSON object per line, appended synchronously so every decision is on
 * disk before the hook process exits. Commands are truncated and obvious
 * credentials redacted. When the file grows past `maxBytes` it is rotated
 * to `<file>.1` (a single previous generation is kept).
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';

import type { IObserver, DecisionEvent, SecurityEvent } from '@shellgate/core';

export interface FileObserverOptions {
  /** Defaults to ~/.shellgate/logs/audit.jsonl */
  filePath?: string;
  /** Defaults to 5 MiB. */
  maxBytes?: number;
}

const DEFAULT_MAX_BYTES = 5 * 1024 * 1024;
const MAX_COMMAND_LENGTH = 200;
const REDACTED = '***REDACTED***';

const SECRET_PATTERNS: readonly RegExp[] = [
  /\b(api_?key|token|secret|password|passwd|credential)\s*=\s*\S+/gi,
  /\bbearer\s+[\w.-]+/gi,
  /AKIA[0-9A-Z]{16}/g,
];

export function redactSecrets(text: string): string {
  let redacted = text;
  for (const pattern of SECRET_PATTERNS) {
    redacted = redacted.replace(pattern, REDACTED);
  }
  return redacted;
}

function truncate(text: string): string {
  return text.length > MAX_COMMAND_LENGTH ? `${text.slice(0, MAX_COMMAND_LENGTH)}...` : text;
}

export class FileObserver implements IObserver {
  readonly filePath: string;
  private readonly maxBytes: number;

  constructor(options: FileObserverOptions = {}) {
    this.filePath = options.filePath ?? join(homedir(), '.shellgate', 'logs', 'audit.jsonl');
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
  }

  onDecision(event: DecisionEvent): void {
    this.write({
      kind: 'decision',
      timestamp: event.timestamp.toISOString(),
      tool: event.toolName,
      command: event.command !== undefined ? truncate(redactSecrets(event.command)) : undefined,
      decision: event.verdict,
      reason: event.reason,
      duration: event.duration,
    });
  }

  onSecurityEvent(event: SecurityEvent): void {
    const details = { ...event.details };
    if (typeof details['command'] === 'string') {
      details['command'] = truncate(redactSecrets(details['command']));
    }
    if (typeof details['segment'] === 'string') {
      details['segment'] = truncate(redactSecrets(details['segment']));
    }
    this.write({
      kind: 'security',
      timestamp: event.timestamp.toISOString(),
      type: event.type,
      details,
    });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.write({
      kind: 'error',
      timestamp: new Date().toISOString(),
      name: error.name,
      message: error.message,
      context,
    });
  }

  async flush(): Promise<void> {
    // Writes are synchronous; nothing is buffered.
  }

  // ---- internals ----------------------------------------------------------

  private write(entry: Record<string, unknown>): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.rotateIfNeeded();
      appendFileSync(this.filePath, JSON.stringify(entry) + '\n', 'utf8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[FileObserver] failed to write audit log: ${message}`);
    }
  }

  private rotateIfNeeded(): void {
    if (!existsSync(this.filePath)) return;
    if (statSync(this.filePath).size < this.maxBytes) return;
    renameSync(this.filePath, `${this.filePath}.1`);
  }
}
