/**
 * Tests for the hook adapter -- wire format and the async entry point.
 */

import { bashSecurityHook, toHookResponse } from './hook.js';
import { HookDecisionEngine } from './engine.js';
import { createPolicyConfig } from './policy-config.js';

function bash(command: string): unknown {
  return { tool_name: 'Bash', tool_input: { command } };
}

describe('toHookResponse', () => {
  it('maps verdict and reason', () => {
    expect(toHookResponse({ verdict: 'block', reason: 'nope' })).toEqual({ decision: 'block', reason: 'nope' });
    expect(toHookResponse({ verdict: 'allow', reason: '' })).toEqual({ decision: 'allow', reason: '' });
  });
});

describe('bashSecurityHook', () => {
  it('allows chmod +x followed by the init script', async () => {
    await expect(bashSecurityHook(bash('chmod +x init.sh && ./init.sh'))).resolves.toEqual({
      decision: 'allow',
      reason: '',
    });
  });

  it('blocks pkill of a non-dev process', async () => {
    const result = await bashSecurityHook(bash('pkill chrome'));
    expect(result.decision).toBe('block');
  });

  it('blocks rm -rf /', async () => {
    await expect(bashSecurityHook(bash('rm -rf /'))).resolves.toEqual({
      decision: 'block',
      reason: 'Command "rm" is not in the allowlist',
    });
  });

  it('allows pkill -f of a node server', async () => {
    const result = await bashSecurityHook(bash("pkill -f 'node server.js'"));
    expect(result.decision).toBe('allow');
  });

  it('blocks malformed input instead of throwing', async () => {
    const result = await bashSecurityHook(undefined);
    expect(result).toEqual({ decision: 'block', reason: 'malformed hook input: expected an object' });
  });

  it('accepts an injected engine', async () => {
    const engine = new HookDecisionEngine({ policy: createPolicyConfig({ allowedCommands: ['make'] }) });
    expect((await bashSecurityHook(bash('make test'), engine)).decision).toBe('allow');
    expect((await bashSecurityHook(bash('ls'), engine)).decision).toBe('block');
  });

  it('evaluates concurrent requests independently', async () => {
    const results = await Promise.all([
      bashSecurityHook(bash('ls')),
      bashSecurityHook(bash('rm -rf /')),
      bashSecurityHook(bash('git status')),
    ]);
    expect(results.map((r) => r.decision)).toEqual(['allow', 'block', 'allow']);
  });
});
