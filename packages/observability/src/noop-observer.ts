/**
 * NoopObserver -- silent observer that discards all events.
 *
 * Used when observability is explicitly disabled.
 */

import type { IObserver, DecisionEvent, SecurityEvent } from '@shellgate/core';

export class NoopObserver implements IObserver {
  onDecision(_event: DecisionEvent): void {
    // intentionally empty
  }

  onSecurityEvent(_event: SecurityEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
