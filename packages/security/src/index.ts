/**
 * @shellgate/security -- policy engine barrel export
 *
 * The primary entry point is HookDecisionEngine, which composes the
 * splitter, extractor, allowlist and specialized validators behind
 * IDecisionEngine.
 */

// Command splitting & invocation extraction
export {
  ShellCommandSplitter,
  splitCommands,
  UNBALANCED_QUOTES,
  COMMAND_SUBSTITUTION,
  PROCESS_SUBSTITUTION,
  ANSI_C_QUOTING,
} from './command-splitter.js';
export { tokenize, baseName, isEnvAssignment, parseInvocation, extractCommands } from './invocation.js';

// Policy tables
export {
  createPolicyConfig,
  DEFAULT_ALLOWED_COMMANDS,
  DEFAULT_DEV_PROCESSES,
  DEFAULT_INIT_SCRIPT,
  DEFAULT_SHELL_TOOLS,
} from './policy-config.js';
export type { PolicyOptions } from './policy-config.js';

// Validators
export { CommandAllowlist } from './command-allowlist.js';
export type { CommandAllowlistConfig } from './command-allowlist.js';
export { validateChmodArgs, validateChmodCommand } from './chmod-validator.js';
export {
  InitScriptValidator,
  validateInitScript,
  isInitScriptPath,
  isInterpretedInitScript,
  SCRIPT_INTERPRETERS,
} from './init-script-validator.js';
export { PkillPolicy } from './pkill-policy.js';

// Decision engine (main entry point)
export { HookDecisionEngine } from './engine.js';
export type { HookDecisionEngineConfig } from './engine.js';
export { bashSecurityHook, toHookResponse } from './hook.js';
