/**
 * Wire shapes exchanged with the agent harness.
 */

export interface HookToolInput {
  command?: unknown;
  [key: string]: unknown;
}

export interface HookRequest {
  tool_name: string;
  tool_input: HookToolInput;
}

/**
 * Anything other than `decision: 'block'` is treated by the harness as an
 * allow.
 */
export interface HookResponse {
  decision: 'allow' | 'block';
  reason: string;
}
