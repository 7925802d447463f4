/**
 * ShellgateConfig -- shape of ~/.shellgate/config.json after defaults are
 * merged in.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface PolicySection {
  allowedCommands: string[];
  devProcesses: string[];
  initScript: string;
  shellTools: string[];
}

export interface ObservabilitySection {
  /** Observer names to activate (e.g. ["console", "file"]). */
  observers: string[];
  logLevel: LogLevel;
  /** JSONL audit log location for the file observer. */
  logPath?: string;
  /** Rotate the audit log once it grows past this many bytes. */
  maxLogSize?: number;
}

export interface ShellgateConfig {
  policy: PolicySection;
  observability: ObservabilitySection;
}
