/**
 * Hook command -- the pre-tool-use entry point the agent harness invokes.
 *
 * Reads one JSON request from stdin and writes exactly one JSON response
 * to stdout. Every failure path still produces a block response, so the
 * harness never sees an empty reply.
 */

import { HookInputError } from '@shellgate/core';
import type { HookResponse, IDecisionEngine, IObserver } from '@shellgate/core';
import { toHookResponse } from '@shellgate/security';

import { loadConfig } from '../config.js';
import { createRuntime } from '../runtime.js';

const RESET = '\x1b[0m';
const RED = '\x1b[31m';

export const INVALID_JSON_REASON = 'malformed hook input: invalid JSON';

/**
 * Turn raw stdin text into a response. JSON errors are reported to the
 * observer and blocked; everything else is up to the engine.
 */
export function handleHookInput(raw: string, engine: IDecisionEngine, observer?: IObserver): HookResponse {
  let request: unknown;
  try {
    request = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    observer?.onError(new HookInputError(`invalid JSON on stdin: ${message}`), { bytes: raw.length });
    return { decision: 'block', reason: INVALID_JSON_REASON };
  }
  return toHookResponse(engine.decide(request));
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

function respond(response: HookResponse): void {
  process.stdout.write(JSON.stringify(response) + '\n');
}

export async function hook(_args: string[]): Promise<void> {
  let config;
  try {
    config = loadConfig();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${RED}[shellgate] Failed to load config:${RESET} ${message}`);
    respond({ decision: 'block', reason: `configuration error: ${message}` });
    process.exitCode = 1;
    return;
  }

  const { engine, observer } = createRuntime(config);
  const raw = await readStdin();
  respond(handleHookInput(raw, engine, observer));
  await observer.flush?.();
}
