/**
 * @shellgate/core -- shared contracts, config types and errors.
 */

export type {
  Verdict,
  Decision,
  CommandValidation,
  ValidatorKind,
  Invocation,
  PolicyConfig,
  SplitResult,
  ICommandSplitter,
  IDecisionEngine,
} from './interfaces/security.js';

export type { DecisionEvent, SecurityEvent, IObserver } from './interfaces/observer.js';

export type { HookToolInput, HookRequest, HookResponse } from './interfaces/hook.js';

export type {
  LogLevel,
  PolicySection,
  ObservabilitySection,
  ShellgateConfig,
} from './types/config.js';

export { ShellgateError, ConfigError, HookInputError } from './errors/index.js';
