import type { AgentRunResult } from '../kernel/contracts.js';
import type { TaskOutcome } from './types.js';

export const DEFAULT_SUCCESS_CONTENT = 'Task completed successfully';
export const DEFAULT_ERROR_CONTENT = 'Task encountered an error';
export const CANCELLED_CONTENT = 'Task was cancelled by user';

export function summariseRunResult(result: AgentRunResult | null | undefined): TaskOutcome {
  const content = result?.content;
  return {
    content: typeof content === 'string' && content.length > 0 ? content : DEFAULT_SUCCESS_CONTENT,
    success: result?.success ?? true,
  };
}

export function summariseFailure(message: string): TaskOutcome {
  return { content: message || DEFAULT_ERROR_CONTENT, success: false };
}

export function cancelledOutcome(): TaskOutcome {
  return { content: CANCELLED_CONTENT, success: false };
}
