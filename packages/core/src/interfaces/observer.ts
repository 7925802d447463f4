/**
 * IObserver -- observability contract
 *
 * Structured events for every decision the gate makes, security-relevant
 * blocks, and internal errors.
 */

import type { Verdict } from './security.js';

export interface DecisionEvent {
  toolName: string;
  command?: string;
  verdict: Verdict;
  reason: string;
  duration: number;
  timestamp: Date;
}

export interface SecurityEvent {
  type: 'command_blocked' | 'unsafe_syntax' | 'malformed_input';
  details: Record<string, unknown>;
  timestamp: Date;
}

export interface IObserver {
  onDecision(event: DecisionEvent): void;
  onSecurityEvent(event: SecurityEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
