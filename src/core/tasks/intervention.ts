import { randomUUID } from 'node:crypto';
import { InterventionTimeoutError, errorMessage } from '../errors.js';
import type { EventBus } from '../kernel/event-bus.js';
import type { InterventionOutcome, InterventionStatus, StructuredLogger } from '../kernel/contracts.js';
import type { ConnectionHandle } from '../gateway/connection.js';
import { wireTimestamp } from '../gateway/protocol.js';

export const DEFAULT_INTERVENTION_REASON = 'Action requires human intervention';

interface PendingIntervention {
  id: string;
  taskKey: string;
  reason: string;
  createdAt: number;
  resolve: () => void;
}

export interface InterventionRendezvousOptions {
  connection: ConnectionHandle;
  logger: StructuredLogger;
  timeoutMs: number;
  events?: EventBus;
  clock?: () => number;
  createId?: () => string;
}

/**
 * Pairs a running task's request for a human decision with the operator's
 * `human_intervention_complete` frame. Each request yields exactly one
 * outcome and its record is dropped whatever that outcome is.
 */
export class InterventionRendezvous {
  private readonly waiting = new Map<string, PendingIntervention>();
  private readonly clock: () => number;
  private readonly createId: () => string;

  constructor(private readonly options: InterventionRendezvousOptions) {
    this.clock = options.clock ?? Date.now;
    this.createId = options.createId ?? randomUUID;
  }

  pending(): string[] {
    return Array.from(this.waiting.keys());
  }

  async request(taskKey: string, reason = DEFAULT_INTERVENTION_REASON, signal?: AbortSignal): Promise<InterventionOutcome> {
    const { connection, logger } = this.options;
    const id = this.createId();

    if (!connection.connected) {
      logger.warn('Intervention requested without operator connection', { taskKey, reason });
      return { interventionId: id, status: 'failed', success: false, message: 'No websocket connection available' };
    }

    let release: () => void = () => undefined;
    const completed = new Promise<'completed'>((resolve) => {
      release = () => resolve('completed');
    });
    this.waiting.set(id, { id, taskKey, reason, createdAt: this.clock(), resolve: release });

    let cancel: () => void = () => undefined;
    const cancelled = new Promise<'cancelled'>((resolve) => {
      cancel = () => resolve('cancelled');
    });
    const onAbort = (): void => cancel();
    let timer: NodeJS.Timeout | undefined;

    try {
      try {
        await connection.send({
          type: 'human_intervention_required',
          intervention_id: id,
          reason,
          timestamp: wireTimestamp(this.clock()),
        });
      } catch (error) {
        logger.warn('Intervention request could not be sent', { taskKey, error: errorMessage(error) });
        return this.settle(id, taskKey, 'failed', `Failed to request intervention: ${errorMessage(error)}`);
      }

      this.options.events?.publish('intervention:requested', { interventionId: id, taskKey, reason });
      logger.info('Waiting for human intervention', { interventionId: id, taskKey, reason });

      const { timeoutMs } = this.options;
      const timedOut = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new InterventionTimeoutError(id, timeoutMs)), timeoutMs);
      });
      if (signal?.aborted) {
        cancel();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      let status: 'completed' | 'cancelled';
      try {
        status = await Promise.race([completed, timedOut, cancelled]);
      } catch (error) {
        if (!(error instanceof InterventionTimeoutError)) {
          throw error;
        }
        logger.warn('Intervention timed out', {
          interventionId: error.interventionId,
          taskKey,
          timeoutMs: error.timeoutMs,
        });
        return this.settle(id, taskKey, 'timeout', 'Timeout waiting for human intervention');
      }
      return status === 'completed'
        ? this.settle(id, taskKey, 'completed', `Human intervention completed for: ${reason}`)
        : this.settle(id, taskKey, 'cancelled', `Intervention wait cancelled: ${reason}`);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      this.waiting.delete(id);
    }
  }

  /** Resolve the waiter for `id`. Unknown ids are logged and ignored. */
  complete(id: string): boolean {
    const entry = this.waiting.get(id);
    if (!entry) {
      this.options.logger.warn('Intervention id not found', { interventionId: id });
      return false;
    }
    entry.resolve();
    return true;
  }

  private settle(id: string, taskKey: string, status: InterventionStatus, message: string): InterventionOutcome {
    this.options.events?.publish('intervention:resolved', { interventionId: id, taskKey, status });
    return { interventionId: id, status, success: status === 'completed', message };
  }
}
