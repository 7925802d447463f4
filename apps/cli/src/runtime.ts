/**
 * Wires a loaded ShellgateConfig into a ready engine and observer.
 */

import type { IObserver, ShellgateConfig } from '@shellgate/core';
import { createObserver } from '@shellgate/observability';
import { createPolicyConfig, HookDecisionEngine } from '@shellgate/security';

export interface GateRuntime {
  engine: HookDecisionEngine;
  observer: IObserver;
}

export function createRuntime(config: ShellgateConfig): GateRuntime {
  const observer = createObserver(config.observability);
  const engine = new HookDecisionEngine({
    policy: createPolicyConfig(config.policy),
    observer,
  });
  return { engine, observer };
}
