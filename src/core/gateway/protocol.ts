import { z } from 'zod';
import type { ToolCallStatus } from '../kernel/contracts.js';

// ---------------------------------------------------------------------------
// Inbound frames
// ---------------------------------------------------------------------------

const BrowserAgentRequestSchema = z.object({
  type: z.literal('browser_agent_request'),
  prompt: z.string().optional(),
  tab_id: z.string().min(1).optional(),
  id: z.string().optional(),
});

const KillAgentSchema = z.object({
  type: z.literal('kill_agent'),
  tab_id: z.string().min(1).optional(),
});

const InterventionCompleteSchema = z.object({
  type: z.literal('human_intervention_complete'),
  intervention_id: z.string(),
});

const EndConnectionSchema = z.object({ type: z.literal('end_connection') });

const RestartServerSchema = z.object({ type: z.literal('restart_server') });

const RegularChatSchema = z.object({
  type: z.literal('regular_chat'),
  regular_chat: z.string().optional(),
});

const InboundFrameSchema = z.discriminatedUnion('type', [
  BrowserAgentRequestSchema,
  KillAgentSchema,
  InterventionCompleteSchema,
  EndConnectionSchema,
  RestartServerSchema,
  RegularChatSchema,
]);

export type InboundFrame = z.infer<typeof InboundFrameSchema>;

/**
 * Classified inbound message. Anything that is not a recognised control frame
 * becomes `task_text` carrying the raw frame.
 */
export type InboundMessage =
  | { kind: 'run'; frame: z.infer<typeof BrowserAgentRequestSchema> }
  | { kind: 'kill'; frame: z.infer<typeof KillAgentSchema> }
  | { kind: 'intervention_complete'; frame: z.infer<typeof InterventionCompleteSchema> }
  | { kind: 'end_connection' }
  | { kind: 'restart_server' }
  | { kind: 'chat'; text: string }
  | { kind: 'task_text'; text: string };

export function parseInboundFrame(raw: string): InboundMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { kind: 'task_text', text: raw };
  }

  const parsed = InboundFrameSchema.safeParse(data);
  if (!parsed.success) {
    return { kind: 'task_text', text: raw };
  }

  const frame = parsed.data;
  switch (frame.type) {
    case 'browser_agent_request':
      return { kind: 'run', frame };
    case 'kill_agent':
      return { kind: 'kill', frame };
    case 'human_intervention_complete':
      return { kind: 'intervention_complete', frame };
    case 'end_connection':
      return { kind: 'end_connection' };
    case 'restart_server':
      return { kind: 'restart_server' };
    case 'regular_chat':
      return { kind: 'chat', text: frame.regular_chat ?? raw };
  }
}

// ---------------------------------------------------------------------------
// Outbound frames
// ---------------------------------------------------------------------------

export type AckStatus = 'processing' | 'duplicate' | 'ok' | 'error';

export interface AckFrame {
  status: AckStatus;
  message: string;
  tab_id?: string;
  request_id?: string;
}

export interface ToolCallFrame {
  type: 'browser_agent_tool_call';
  tab_id: string;
  tool_call: {
    name: string;
    status: ToolCallStatus;
    details: string;
  };
  timestamp: number;
}

export interface ResultFrame {
  type: 'browser_agent_response';
  tab_id: string;
  result: {
    content: string;
    success: boolean;
  };
  timestamp: number;
}

export interface InterventionRequiredFrame {
  type: 'human_intervention_required';
  intervention_id: string;
  reason: string;
  timestamp: number;
}

export type OutboundFrame = AckFrame | ToolCallFrame | ResultFrame | InterventionRequiredFrame;

/** Seconds since the epoch, as a float. */
export function wireTimestamp(now: number = Date.now()): number {
  return now / 1_000;
}
