/**
 * HookDecisionEngine -- the allow/block gate for shell tool calls.
 *
 * Composes the splitter, invocation extractor, allowlist and the three
 * specialized validators. Each sub-command is dispatched to exactly one
 * validator by its ValidatorKind; the request is allowed only when every
 * sub-command is, and the first block supplies the reason.
 *
 * The engine is stateless apart from its frozen PolicyConfig and never
 * throws: malformed input and unparseable commands are blocks.
 */

import type {
  CommandValidation,
  Decision,
  HookRequest,
  ICommandSplitter,
  IDecisionEngine,
  IObserver,
  Invocation,
  PolicyConfig,
  SecurityEvent,
  ValidatorKind,
} from '@shellgate/core';

import { ShellCommandSplitter } from './command-splitter.js';
import { CommandAllowlist } from './command-allowlist.js';
import { validateChmodArgs } from './chmod-validator.js';
import { InitScriptValidator, isInitScriptPath, isInterpretedInitScript } from './init-script-validator.js';
import { PkillPolicy } from './pkill-policy.js';
import { parseInvocation } from './invocation.js';
import { createPolicyConfig } from './policy-config.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface HookDecisionEngineConfig {
  /** Allowlists and script name. Defaults to createPolicyConfig(). */
  policy?: PolicyConfig;
  /** Replacement for the minimal quote-aware splitter. */
  splitter?: ICommandSplitter;
  /** Receives one onDecision per decide() call and a security event per block. */
  observer?: IObserver;
}

/** Programs routed to PkillPolicy. */
const PROCESS_KILLERS: ReadonlySet<string> = new Set(['pkill', 'killall']);

const NO_COMMAND = 'no command found';

type RequestCheck = { ok: true; request: HookRequest } | { ok: false; reason: string };

function allow(): Decision {
  return { verdict: 'allow', reason: '' };
}

function block(reason: string): Decision {
  return { verdict: 'block', reason };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkRequest(value: unknown): RequestCheck {
  if (!isRecord(value)) {
    return { ok: false, reason: 'malformed hook input: expected an object' };
  }
  const toolName = value['tool_name'];
  if (typeof toolName !== 'string') {
    return { ok: false, reason: 'malformed hook input: tool_name must be a string' };
  }
  const toolInput = value['tool_input'];
  if (!isRecord(toolInput)) {
    return { ok: false, reason: 'malformed hook input: tool_input must be an object' };
  }
  return { ok: true, request: { tool_name: toolName, tool_input: toolInput } };
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export class HookDecisionEngine implements IDecisionEngine {
  readonly policy: PolicyConfig;

  private readonly splitter: ICommandSplitter;
  private readonly observer: IObserver | null;
  private readonly allowlist: CommandAllowlist;
  private readonly initScriptValidator: InitScriptValidator;
  private readonly pkillPolicy: PkillPolicy;

  constructor(config: HookDecisionEngineConfig = {}) {
    this.policy = config.policy ?? createPolicyConfig();
    this.splitter = config.splitter ?? new ShellCommandSplitter();
    this.observer = config.observer ?? null;

    this.allowlist = new CommandAllowlist({
      allowedCommands: this.policy.allowedCommands,
      initScript: this.policy.initScript,
    });
    this.initScriptValidator = new InitScriptValidator(this.policy.initScript);
    this.pkillPolicy = new PkillPolicy(this.policy.devProcesses);
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Decide on a hook request. Tools outside `policy.shellTools` pass
   * through; shell tools are evaluated command by command.
   */
  decide(request: unknown): Decision {
    const startedAt = Date.now();
    const checked = checkRequest(request);

    let decision: Decision;
    let toolName = '';
    let command: string | undefined;

    if (!checked.ok) {
      decision = block(checked.reason);
      this.emitSecurity('malformed_input', { reason: checked.reason });
    } else {
      toolName = checked.request.tool_name;
      const rawCommand = checked.request.tool_input.command;

      if (!this.policy.shellTools.has(toolName)) {
        decision = allow();
      } else if (typeof rawCommand !== 'string') {
        decision = block('malformed hook input: command must be a string');
        this.emitSecurity('malformed_input', { tool: toolName, reason: decision.reason });
      } else {
        command = rawCommand;
        decision = this.evaluateCommand(rawCommand);
      }
    }

    const event = {
      toolName,
      command,
      verdict: decision.verdict,
      reason: decision.reason,
      duration: Date.now() - startedAt,
      timestamp: new Date(),
    };
    this.notify((observer) => observer.onDecision(event));

    return decision;
  }

  /** Evaluate a raw shell command. All sub-commands must pass. */
  evaluateCommand(command: string): Decision {
    const { segments, error } = this.splitter.split(command);
    if (error !== undefined) {
      this.emitSecurity('unsafe_syntax', { command, reason: error });
      return block(error);
    }

    if (segments.length === 0) {
      this.emitSecurity('command_blocked', { command, reason: NO_COMMAND });
      return block(NO_COMMAND);
    }

    for (const segment of segments) {
      const decision = this.evaluateSubCommand(segment);
      if (decision.verdict === 'block') {
        this.emitSecurity('command_blocked', { command, segment, reason: decision.reason });
        return decision;
      }
    }

    return allow();
  }

  /** Pick the validator that owns an invocation. */
  classify(invocation: Invocation): ValidatorKind {
    if (invocation.program === 'chmod') return 'chmod';
    if (isInitScriptPath(invocation.rawProgram, this.policy.initScript)) return 'init_script';
    if (isInterpretedInitScript(invocation, this.policy.initScript)) return 'init_script';
    if (PROCESS_KILLERS.has(invocation.program)) return 'pkill';
    return 'generic';
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private evaluateSubCommand(segment: string): Decision {
    const invocation = parseInvocation(segment);
    if (!invocation) return block(NO_COMMAND);

    const result = this.validate(this.classify(invocation), invocation);
    return result.allowed ? allow() : block(result.reason ?? `Command "${invocation.program}" was rejected`);
  }

  private validate(kind: ValidatorKind, invocation: Invocation): CommandValidation {
    switch (kind) {
      case 'init_script':
        return this.initScriptValidator.validate(invocation);
      case 'chmod':
        return this.requireAllowlisted(invocation, () => validateChmodArgs(invocation.args));
      case 'pkill':
        return this.requireAllowlisted(invocation, () => this.pkillPolicy.validate(invocation.args));
      case 'generic':
        return this.allowlist.validate(invocation);
    }
  }

  /** Specialized validators only narrow what the allowlist already admits. */
  private requireAllowlisted(invocation: Invocation, check: () => CommandValidation): CommandValidation {
    const membership = this.allowlist.validate(invocation);
    return membership.allowed ? check() : membership;
  }

  private emitSecurity(type: SecurityEvent['type'], details: Record<string, unknown>): void {
    this.notify((observer) => observer.onSecurityEvent({ type, details, timestamp: new Date() }));
  }

  /** A failing observer is logged and never changes the decision. */
  private notify(fn: (observer: IObserver) => void): void {
    if (!this.observer) return;
    try {
      fn(this.observer);
    } catch (err) {
      console.error('[HookDecisionEngine] observer threw:', err);
    }
  }
}
