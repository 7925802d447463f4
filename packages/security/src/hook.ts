/**
 * Hook adapter -- maps engine decisions onto the harness wire format.
 */

import type { Decision, HookResponse, IDecisionEngine } from '@shellgate/core';

import { HookDecisionEngine } from './engine.js';

let defaultEngine: HookDecisionEngine | null = null;

function getDefaultEngine(): HookDecisionEngine {
  defaultEngine ??= new HookDecisionEngine();
  return defaultEngine;
}

export function toHookResponse(decision: Decision): HookResponse {
  return { decision: decision.verdict, reason: decision.reason };
}

/**
 * Pre-tool-use hook for shell commands. Accepts the raw request as the
 * harness sent it; anything malformed comes back as a block.
 */
export async function bashSecurityHook(
  input: unknown,
  engine: IDecisionEngine = getDefaultEngine(),
): Promise<HookResponse> {
  return toHookResponse(engine.decide(input));
}
