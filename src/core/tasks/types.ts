import type { AutomationAgent, BrowserSession } from '../kernel/contracts.js';

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(['completed', 'failed', 'cancelled']);

export interface TaskOutcome {
  content: string;
  success: boolean;
}

export interface TaskRecord {
  key: string;
  requestId: string;
  prompt: string;
  status: TaskStatus;
  createdAt: number;
  startedAt?: number;
  endedAt?: number;
  /** Aborted when the task is cancelled; `signal` is handed to the agent. */
  abort: AbortController;
  /** Held weakly so a finished agent can be collected while the record lingers. */
  agent?: WeakRef<AutomationAgent>;
  session?: BrowserSession;
  /** The unit of work, set once the runner has been spawned. */
  work?: Promise<void>;
  outcome?: TaskOutcome;
}

export interface TaskAdmission {
  key: string;
  prompt: string;
  requestId: string;
}

export type AdmitResult =
  | { accepted: true; record: TaskRecord }
  | { accepted: false; existing: TaskRecord };

export interface TaskSnapshot {
  key: string;
  requestId: string;
  status: TaskStatus;
  createdAt: number;
  startedAt: number | null;
}
