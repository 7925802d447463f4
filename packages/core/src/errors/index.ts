/**
 * Error hierarchy for shellgate.
 *
 * Every error carries a stable `code` and optional structured `context`
 * so observers can record it without parsing messages.
 */

export class ShellgateError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ShellgateError';
    this.code = code;
    this.context = context;
  }
}

export class ConfigError extends ShellgateError {
  readonly field?: string;

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', field !== undefined ? { ...context, field } : context);
    this.name = 'ConfigError';
    this.field = field;
  }
}

/** The harness sent something that is not a well-formed hook request. */
export class HookInputError extends ShellgateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'HOOK_INPUT_ERROR', context);
    this.name = 'HookInputError';
  }
}
