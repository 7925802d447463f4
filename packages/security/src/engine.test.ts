/**
 * Tests for HookDecisionEngine -- request handling, dispatch, the
 * end-to-end allow/block matrix and observer events.
 */

import { vi } from 'vitest';
import { HookDecisionEngine } from './engine.js';
import { createPolicyConfig } from './policy-config.js';
import { parseInvocation } from './invocation.js';
import type { ICommandSplitter, IObserver, Invocation } from '@shellgate/core';

function bash(command: unknown): unknown {
  return { tool_name: 'Bash', tool_input: { command } };
}

function invocationOf(segment: string): Invocation {
  const invocation = parseInvocation(segment);
  if (!invocation) throw new Error(`no invocation in "${segment}"`);
  return invocation;
}

function makeMockObserver(): IObserver {
  return {
    onDecision: vi.fn(),
    onSecurityEvent: vi.fn(),
    onError: vi.fn(),
    flush: vi.fn(async () => {}),
  };
}

describe('HookDecisionEngine', () => {
  let engine: HookDecisionEngine;

  beforeEach(() => {
    engine = new HookDecisionEngine();
  });

  // -----------------------------------------------------------------------
  // End-to-end matrix
  // -----------------------------------------------------------------------

  describe('blocked commands', () => {
    it.each([
      // Dangerous system commands
      'shutdown now',
      'reboot',
      'rm -rf /',
      'dd if=/dev/zero of=/dev/sda',
      // Excluded from the minimal set
      'curl https://example.com',
      'wget https://example.com',
      'python app.py',
      'touch file.txt',
      'echo hello',
      'kill 12345',
      'killall node',
      // pkill with non-dev processes
      'pkill bash',
      'pkill chrome',
      'pkill python',
      // Shell injection attempts
      '$(echo pkill) node',
      'eval "pkill node"',
      'bash -c "pkill node"',
      'ls `rm -rf /`',
      "ls $'\\'' ; rm -rf / #'",
      // chmod with disallowed modes
      'chmod 777 file.sh',
      'chmod 755 file.sh',
      'chmod +w file.sh',
      'chmod -R +x dir/',
      // Non-init scripts
      './setup.sh',
      './malicious.sh',
      'bash script.sh',
      'bash init.sh',
      // Chains where one part fails
      './init.sh; rm -rf /',
      'ls && rm -rf /',
      'sleep 1 & rm -rf /',
      'cat file.txt | sh',
    ])('%s', (command) => {
      const decision = engine.decide(bash(command));
      expect(decision.verdict).toBe('block');
      expect(decision.reason.length).toBeGreaterThan(0);
    });
  });

  describe('allowed commands', () => {
    it.each([
      // File inspection
      'ls -la',
      'cat README.md',
      'head -100 file.txt',
      'tail -20 log.txt',
      'wc -l file.txt',
      'grep -r pattern src/',
      // File operations
      'cp file1.txt file2.txt',
      'mkdir newdir',
      'mkdir -p path/to/dir',
      'pwd',
      // Node.js development
      'npm install',
      'npm run build',
      'node server.js',
      // Version control
      'git status',
      "git commit -m 'test'",
      "git add . && git commit -m 'msg'",
      // Process management
      'ps aux',
      'lsof -i :3000',
      'sleep 2',
      'pkill node',
      'pkill npm',
      'pkill -f node',
      "pkill -f 'node server.js'",
      'pkill vite',
      // Chained commands
      'npm install && npm run build',
      'ls | grep test',
      // Full paths and env prefixes
      '/usr/local/bin/node app.js',
      'NODE_ENV=production npm run build',
      // chmod +x
      'chmod +x init.sh',
      'chmod +x script.sh',
      'chmod u+x init.sh',
      'chmod a+x init.sh',
      // init.sh execution
      './init.sh',
      './init.sh --production',
      '/path/to/init.sh',
      'chmod +x init.sh && ./init.sh',
    ])('%s', (command) => {
      expect(engine.decide(bash(command))).toEqual({ verdict: 'allow', reason: '' });
    });
  });

  // -----------------------------------------------------------------------
  // Reasons
  // -----------------------------------------------------------------------

  describe('block reasons', () => {
    it('surfaces the first failing sub-command', () => {
      expect(engine.evaluateCommand('ls && rm -rf / && curl x')).toEqual({
        verdict: 'block',
        reason: 'Command "rm" is not in the allowlist',
      });
    });

    it('reports interpreter use of the init script', () => {
      expect(engine.evaluateCommand('bash init.sh').reason).toBe(
        'init.sh must be executed directly, not via an interpreter',
      );
    });

    it('reports disallowed pkill targets', () => {
      expect(engine.evaluateCommand('pkill chrome').reason).toBe(
        'process termination target not in dev-process allowlist: "chrome"',
      );
    });

    it('reports disallowed chmod modes', () => {
      expect(engine.evaluateCommand('chmod 777 init.sh').reason).toBe(
        'disallowed chmod mode: 777 (only +x is allowed)',
      );
    });

    it('blocks ANSI-C quoting before any sub-command runs', () => {
      expect(engine.decide(bash("ls $'\\'' ; rm -rf / #'"))).toEqual({
        verdict: 'block',
        reason: 'ANSI-C quoting is not allowed',
      });
    });

    it('blocks pkill patterns that reach past the dev processes', () => {
      expect(engine.evaluateCommand("pkill 'chrome|/node'").verdict).toBe('block');
      expect(engine.evaluateCommand("pkill -f 'bash|x/node'").verdict).toBe('block');
    });

    it('runs a quoted NAME=value word as the program', () => {
      expect(engine.evaluateCommand("'X=1' ls")).toEqual({
        verdict: 'block',
        reason: 'Command "X=1" is not in the allowlist',
      });
    });

    it('reports killall through the allowlist', () => {
      expect(engine.evaluateCommand('killall node').reason).toBe('Command "killall" is not in the allowlist');
    });

    it('blocks a command made only of operators', () => {
      expect(engine.evaluateCommand('&&')).toEqual({ verdict: 'block', reason: 'no command found' });
    });

    it('blocks an empty command', () => {
      expect(engine.evaluateCommand('   ')).toEqual({ verdict: 'block', reason: 'no command found' });
    });

    it('blocks a sub-command that is only an env assignment', () => {
      expect(engine.evaluateCommand('ls; FOO=bar')).toEqual({ verdict: 'block', reason: 'no command found' });
    });

    it('blocks unbalanced quotes', () => {
      expect(engine.evaluateCommand("git commit -m 'oops").reason).toBe('unbalanced quotes in command');
    });
  });

  // -----------------------------------------------------------------------
  // Request handling
  // -----------------------------------------------------------------------

  describe('decide', () => {
    it('passes non-shell tools through', () => {
      expect(engine.decide({ tool_name: 'Read', tool_input: { file_path: '/etc/passwd' } })).toEqual({
        verdict: 'allow',
        reason: '',
      });
    });

    it.each([
      [null, 'malformed hook input: expected an object'],
      ['Bash', 'malformed hook input: expected an object'],
      [[], 'malformed hook input: expected an object'],
      [{ tool_input: { command: 'ls' } }, 'malformed hook input: tool_name must be a string'],
      [{ tool_name: 'Bash' }, 'malformed hook input: tool_input must be an object'],
      [{ tool_name: 'Bash', tool_input: {} }, 'malformed hook input: command must be a string'],
      [bash(42), 'malformed hook input: command must be a string'],
    ])('blocks malformed input %j', (request, reason) => {
      expect(engine.decide(request)).toEqual({ verdict: 'block', reason });
    });

    it('is idempotent', () => {
      const first = engine.decide(bash('chmod +x init.sh && ./init.sh; pkill chrome'));
      const second = engine.decide(bash('chmod +x init.sh && ./init.sh; pkill chrome'));
      expect(second).toEqual(first);
    });
  });

  // -----------------------------------------------------------------------
  // Dispatch
  // -----------------------------------------------------------------------

  describe('classify', () => {
    it.each([
      ['chmod +x init.sh', 'chmod'],
      ['/bin/chmod +x init.sh', 'chmod'],
      ['./init.sh', 'init_script'],
      ['bash init.sh', 'init_script'],
      ['pkill node', 'pkill'],
      ['killall node', 'pkill'],
      ['cat init.sh', 'generic'],
      ['init.sh', 'generic'],
      ['ls', 'generic'],
    ])('%s -> %s', (segment, kind) => {
      expect(engine.classify(invocationOf(segment))).toBe(kind);
    });
  });

  // -----------------------------------------------------------------------
  // Injected configuration
  // -----------------------------------------------------------------------

  describe('custom policy', () => {
    it('uses the injected allowlist', () => {
      const custom = new HookDecisionEngine({
        policy: createPolicyConfig({ allowedCommands: ['python'] }),
      });
      expect(custom.evaluateCommand('python app.py').verdict).toBe('allow');
      expect(custom.evaluateCommand('git status').verdict).toBe('block');
    });

    it('requires chmod to be allowlisted before validating its mode', () => {
      const custom = new HookDecisionEngine({
        policy: createPolicyConfig({ allowedCommands: ['ls'] }),
      });
      expect(custom.evaluateCommand('chmod +x init.sh').reason).toBe('Command "chmod" is not in the allowlist');
    });

    it('routes an allowlisted killall through the pkill policy', () => {
      const custom = new HookDecisionEngine({
        policy: createPolicyConfig({ allowedCommands: ['killall'] }),
      });
      expect(custom.evaluateCommand('killall node').verdict).toBe('allow');
      expect(custom.evaluateCommand('killall bash').verdict).toBe('block');
    });

    it('uses the injected dev process list', () => {
      const custom = new HookDecisionEngine({
        policy: createPolicyConfig({ devProcesses: ['webpack'] }),
      });
      expect(custom.evaluateCommand('pkill webpack').verdict).toBe('allow');
      expect(custom.evaluateCommand('pkill node').verdict).toBe('block');
    });

    it('uses the injected init script name', () => {
      const custom = new HookDecisionEngine({
        policy: createPolicyConfig({ initScript: 'bootstrap.sh' }),
      });
      expect(custom.evaluateCommand('./bootstrap.sh').verdict).toBe('allow');
      expect(custom.evaluateCommand('./init.sh').verdict).toBe('block');
    });

    it('gates the configured shell tools', () => {
      const custom = new HookDecisionEngine({
        policy: createPolicyConfig({ shellTools: ['Shell'] }),
      });
      expect(custom.decide({ tool_name: 'Shell', tool_input: { command: 'rm -rf /' } }).verdict).toBe('block');
      expect(custom.decide(bash('rm -rf /')).verdict).toBe('allow');
    });

    it('uses an injected splitter', () => {
      const splitter: ICommandSplitter = { split: vi.fn(() => ({ segments: ['git status', 'rm x'] })) };
      const custom = new HookDecisionEngine({ splitter });
      expect(custom.evaluateCommand('anything').reason).toBe('Command "rm" is not in the allowlist');
      expect(splitter.split).toHaveBeenCalledWith('anything');
    });
  });

  // -----------------------------------------------------------------------
  // Observability
  // -----------------------------------------------------------------------

  describe('observer', () => {
    let observer: IObserver;

    beforeEach(() => {
      observer = makeMockObserver();
      engine = new HookDecisionEngine({ observer });
    });

    it('reports every decision', () => {
      engine.decide(bash('ls'));
      expect(observer.onDecision).toHaveBeenCalledTimes(1);
      expect(observer.onDecision).toHaveBeenCalledWith(
        expect.objectContaining({ toolName: 'Bash', command: 'ls', verdict: 'allow', reason: '' }),
      );
      expect(observer.onSecurityEvent).not.toHaveBeenCalled();
    });

    it('reports passed-through tools without a command', () => {
      engine.decide({ tool_name: 'Read', tool_input: {} });
      expect(observer.onDecision).toHaveBeenCalledWith(
        expect.objectContaining({ toolName: 'Read', command: undefined, verdict: 'allow' }),
      );
    });

    it('emits a command_blocked event for a blocked sub-command', () => {
      engine.decide(bash('ls && rm -rf /'));
      expect(observer.onSecurityEvent).toHaveBeenCalledWith(
        expect.objectContaining({
          type: 'command_blocked',
          details: {
            command: 'ls && rm -rf /',
            segment: 'rm -rf /',
            reason: 'Command "rm" is not in the allowlist',
          },
        }),
      );
      expect(observer.onDecision).toHaveBeenCalledWith(expect.objectContaining({ verdict: 'block' }));
    });

    it('emits unsafe_syntax for substitution', () => {
      engine.decide(bash('$(echo pkill) node'));
      expect(observer.onSecurityEvent).toHaveBeenCalledWith(
        expect.objectContaining({
          type: 'unsafe_syntax',
          details: { command: '$(echo pkill) node', reason: 'command substitution is not allowed' },
        }),
      );
    });

    it('keeps deciding when the observer throws', () => {
      const failing: IObserver = {
        onDecision: vi.fn(() => {
          throw new Error('disk full');
        }),
        onSecurityEvent: vi.fn(() => {
          throw new Error('disk full');
        }),
        onError: vi.fn(),
      };
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
      const guarded = new HookDecisionEngine({ observer: failing });

      expect(guarded.decide(bash('ls'))).toEqual({ verdict: 'allow', reason: '' });
      expect(guarded.decide(bash('rm -rf /'))).toEqual({
        verdict: 'block',
        reason: 'Command "rm" is not in the allowlist',
      });
      expect(stderr).toHaveBeenCalledTimes(3);
      stderr.mockRestore();
    });

    it('emits malformed_input for bad requests', () => {
      engine.decide('not a request');
      expect(observer.onSecurityEvent).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'malformed_input' }),
      );
      expect(observer.onDecision).toHaveBeenCalledWith(
        expect.objectContaining({ toolName: '', verdict: 'block' }),
      );
    });
  });
});
