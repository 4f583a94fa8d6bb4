import { TaskCancelledError, errorMessage } from '../errors.js';
import type { EventBus } from '../kernel/event-bus.js';
import type { RuntimeConfig, StructuredLogger } from '../kernel/contracts.js';
import { isTerminal, type TaskRegistry } from './task-registry.js';
import type { TaskRecord } from './types.js';

export type CancelTarget = { scope: 'task'; key: string } | { scope: 'all' };

export interface CancelReport {
  scope: CancelTarget['scope'];
  /** Keys of the live tasks the request escalated against. */
  matched: string[];
  /** True when a targeted kill found nothing live and raised the global flag instead. */
  fallback: boolean;
}

export interface CancellationCoordinatorOptions {
  registry: TaskRegistry;
  settings: RuntimeConfig['tasks'];
  logger: StructuredLogger;
  events?: EventBus;
}

const STEP_TIMED_OUT = Symbol('step-timed-out');

function timeoutAfter(ms: number): { promise: Promise<typeof STEP_TIMED_OUT>; clear: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<typeof STEP_TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(STEP_TIMED_OUT), ms);
  });
  return { promise, clear: () => clearTimeout(timer) };
}

/**
 * Owns the cancellation state: a global flag and the set of task keys with a
 * pending cancellation. Units of work observe it through `checkpoint()` and
 * `whenCancelled()`.
 */
export class CancellationCoordinator {
  private globalFlag = false;
  private readonly pending = new Set<string>();

  constructor(private readonly options: CancellationCoordinatorOptions) {}

  get globalRequested(): boolean {
    return this.globalFlag;
  }

  isRequested(key: string): boolean {
    return this.globalFlag || this.pending.has(key);
  }

  /** @throws TaskCancelledError once `key` or every task has been cancelled. */
  checkpoint(key: string): void {
    if (this.isRequested(key)) {
      throw new TaskCancelledError(key);
    }
  }

  /** Resolves when the record's token is aborted. */
  whenCancelled(record: TaskRecord): Promise<void> {
    const { signal } = record.abort;
    if (signal.aborted) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  async requestCancel(target: CancelTarget): Promise<CancelReport> {
    const { registry, settings, logger } = this.options;
    let report: CancelReport;
    let targets: TaskRecord[];

    if (target.scope === 'all') {
      targets = registry.active();
      this.globalFlag = true;
      report = { scope: 'all', matched: targets.map((record) => record.key), fallback: false };
    } else {
      const record = registry.get(target.key);
      if (record && !isTerminal(record.status)) {
        targets = [record];
        this.pending.add(target.key);
        report = { scope: 'task', matched: [target.key], fallback: false };
      } else {
        targets = [];
        const fallback = settings.untargetedKill === 'global';
        logger.warn('Kill request matched no live task', {
          taskKey: target.key,
          policy: settings.untargetedKill,
        });
        if (fallback) {
          this.globalFlag = true;
        }
        report = { scope: 'task', matched: [], fallback };
      }
    }

    // Nothing live to drain: drop the flag now.
    if (this.globalFlag && registry.liveCount() === 0) {
      this.globalFlag = false;
    }

    this.options.events?.publish('task:cancel_requested', {
      scope: report.scope,
      matched: report.matched,
      fallback: report.fallback,
    });

    await Promise.all(targets.map((record) => this.escalate(record)));
    return report;
  }

  /**
   * Clear the per-task entry for a finished task, and the global flag once no
   * other task is live.
   */
  settle(key: string): void {
    this.pending.delete(key);
    if (this.globalFlag && this.options.registry.liveCount(key) === 0) {
      this.globalFlag = false;
    }
  }

  private async escalate(record: TaskRecord): Promise<void> {
    const { settings, logger } = this.options;
    const agent = record.agent?.deref();

    if (agent) {
      agent.state.stopped = true;
      agent.state.consecutiveFailures = Math.max(agent.state.consecutiveFailures, settings.maxAgentFailures + 1);
    }

    const session = record.session;
    if (session) {
      await this.step(record.key, 'abort page operation', () => session.abortCurrentOperation());
    }
    if (agent) {
      await this.step(record.key, 'stop agent', () => agent.stop());
    }

    if (!record.abort.signal.aborted) {
      record.abort.abort(new TaskCancelledError(record.key));
    }
    logger.info('Task cancellation escalated', { taskKey: record.key });
  }

  private async step(key: string, label: string, fn: () => void | Promise<void>): Promise<void> {
    const { logger, settings } = this.options;
    const work = Promise.resolve().then(fn).catch((error: unknown) => {
      logger.warn('Cancellation step failed', { taskKey: key, step: label, error: errorMessage(error) });
    });
    const timeout = timeoutAfter(settings.escalationStepTimeoutMs);
    try {
      const outcome = await Promise.race([work, timeout.promise]);
      if (outcome === STEP_TIMED_OUT) {
        logger.warn('Cancellation step timed out', { taskKey: key, step: label });
      }
    } finally {
      timeout.clear();
    }
  }
}
