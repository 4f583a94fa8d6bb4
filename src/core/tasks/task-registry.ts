import { InvalidTransitionError } from '../errors.js';
import {
  TERMINAL_STATUSES,
  type AdmitResult,
  type TaskAdmission,
  type TaskRecord,
  type TaskSnapshot,
  type TaskStatus,
} from './types.js';

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * One record per task key. Admission is a synchronous check-and-insert, so
 * two requests for the same key can never both be accepted.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, TaskRecord>();

  constructor(private readonly clock: () => number = Date.now) {}

  admit(input: TaskAdmission): AdmitResult {
    const existing = this.tasks.get(input.key);
    if (existing && !isTerminal(existing.status)) {
      return { accepted: false, existing };
    }

    const record: TaskRecord = {
      key: input.key,
      requestId: input.requestId,
      prompt: input.prompt,
      status: 'pending',
      createdAt: this.clock(),
      abort: new AbortController(),
    };
    this.tasks.set(input.key, record);
    return { accepted: true, record };
  }

  /** Remove the entry for `key` only while it still points at `record`. */
  complete(key: string, record: TaskRecord): boolean {
    if (this.tasks.get(key) !== record) {
      return false;
    }
    this.tasks.delete(key);
    return true;
  }

  transition(record: TaskRecord, next: TaskStatus): void {
    if (!ALLOWED_TRANSITIONS[record.status].includes(next)) {
      throw new InvalidTransitionError(record.key, record.status, next);
    }
    record.status = next;
    if (next === 'running') {
      record.startedAt = this.clock();
    } else if (isTerminal(next)) {
      record.endedAt = this.clock();
    }
  }

  get(key: string): TaskRecord | undefined {
    return this.tasks.get(key);
  }

  active(): TaskRecord[] {
    return Array.from(this.tasks.values()).filter((record) => !isTerminal(record.status));
  }

  liveCount(exceptKey?: string): number {
    return this.active().filter((record) => record.key !== exceptKey).length;
  }

  snapshot(): TaskSnapshot[] {
    return this.active().map((record) => ({
      key: record.key,
      requestId: record.requestId,
      status: record.status,
      createdAt: record.createdAt,
      startedAt: record.startedAt ?? null,
    }));
  }
}
