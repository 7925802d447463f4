/**
 * Policy contracts shared by the decision engine and its validators.
 *
 * Fail-closed throughout: anything the engine cannot classify is a block.
 */

export type Verdict = 'allow' | 'block';

/** Final outcome for one request. Blocks always carry a non-empty reason. */
export interface Decision {
  verdict: Verdict;
  reason: string;
}

/** Result of a single validator run over one sub-command. */
export interface CommandValidation {
  allowed: boolean;
  reason?: string;
}

/** Which validator owns a sub-command, chosen from its resolved program. */
export type ValidatorKind = 'chmod' | 'init_script' | 'pkill' | 'generic';

/**
 * A parsed sub-command. `rawProgram` is the program token as written
 * (after env-assignment prefixes are dropped); `program` is its base name.
 */
export interface Invocation {
  rawProgram: string;
  program: string;
  args: string[];
  assignments: string[];
}

/**
 * Process-wide, read-only policy. Built once at startup and injected into
 * the engine.
 */
export interface PolicyConfig {
  /** Base program names that may run. */
  readonly allowedCommands: ReadonlySet<string>;
  /** Process names pkill/killall may target. */
  readonly devProcesses: ReadonlySet<string>;
  /** File name of the project init script that may be executed by path. */
  readonly initScript: string;
  /** Tool names whose input is a shell command; everything else passes. */
  readonly shellTools: ReadonlySet<string>;
}

export interface SplitResult {
  segments: string[];
  /** Present when the command cannot be split safely. */
  error?: string;
}

/** Breaks a raw command into sub-commands at top-level operators. */
export interface ICommandSplitter {
  split(command: string): SplitResult;
}

export interface IDecisionEngine {
  decide(request: unknown): Decision;
  evaluateCommand(command: string): Decision;
}
