import { errorMessage } from '../errors.js';
import type { StructuredLogger, ToolCallStatus } from '../kernel/contracts.js';
import type { ConnectionHandle } from './connection.js';
import { wireTimestamp, type OutboundFrame } from './protocol.js';

export interface TaskResultSummary {
  content: string;
  success: boolean;
}

/**
 * Rewrites the details of well-known browser actions into operator-facing
 * text. Typed text is never echoed back.
 */
export function formatToolDetails(name: string, details: string): string {
  const action = name.toLowerCase();

  if (action.includes('click')) {
    if (!details.includes('index')) {
      return details;
    }
    const parts = details.split(':');
    return parts.length > 1 ? `Clicking element: ${parts[1].trim()}` : 'Clicking interface element';
  }

  if (action.includes('input_text')) {
    return 'Typing text into form field';
  }

  if (action.includes('search_google') && details.includes('Searched for') && details.includes('"')) {
    const query = details.split('"')[1];
    if (query) {
      return `Searching for: ${query}`;
    }
  }

  return details;
}

/**
 * Pushes progress and result frames to the operator. Sending never throws:
 * with no connection the frame is dropped, and a failed write is logged.
 */
export class TelemetryEmitter {
  constructor(
    private readonly connection: ConnectionHandle,
    private readonly logger: StructuredLogger,
    private readonly clock: () => number = Date.now,
  ) {}

  emitToolCall(
    taskKey: string,
    name: string,
    details = '',
    status: ToolCallStatus = 'in_progress',
  ): Promise<boolean> {
    return this.deliver({
      type: 'browser_agent_tool_call',
      tab_id: taskKey,
      tool_call: {
        name,
        status,
        details: formatToolDetails(name, details),
      },
      timestamp: wireTimestamp(this.clock()),
    });
  }

  emitResult(taskKey: string, result: TaskResultSummary): Promise<boolean> {
    return this.deliver({
      type: 'browser_agent_response',
      tab_id: taskKey,
      result: {
        content: result.content,
        success: result.success,
      },
      timestamp: wireTimestamp(this.clock()),
    });
  }

  private async deliver(frame: OutboundFrame): Promise<boolean> {
    if (!this.connection.connected) {
      this.logger.debug('Telemetry dropped: no operator connection', {
        frame: 'type' in frame ? frame.type : frame.status,
      });
      return false;
    }

    try {
      await this.connection.send(frame);
      return true;
    } catch (error) {
      this.logger.debug('Telemetry send failed', { error: errorMessage(error) });
      return false;
    }
  }
}
