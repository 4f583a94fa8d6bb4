import { TaskCancelledError, errorMessage } from '../errors.js';
import type { EventBus } from '../kernel/event-bus.js';
import type {
  AgentDriver,
  AgentRunContext,
  AgentRunResult,
  AutomationAgent,
  RuntimeConfig,
  StructuredLogger,
} from '../kernel/contracts.js';
import type { TelemetryEmitter } from '../gateway/telemetry.js';
import type { CancellationCoordinator } from './cancellation.js';
import type { InterventionRendezvous } from './intervention.js';
import { CANCELLED_CONTENT, cancelledOutcome, summariseFailure, summariseRunResult } from './result-summary.js';
import type { TaskRegistry } from './task-registry.js';
import type { TaskOutcome, TaskRecord, TaskStatus } from './types.js';

export interface TaskRunnerOptions {
  driver: AgentDriver;
  registry: TaskRegistry;
  cancellation: CancellationCoordinator;
  intervention: InterventionRendezvous;
  telemetry: TelemetryEmitter;
  settings: RuntimeConfig['tasks'];
  logger: StructuredLogger;
  events?: EventBus;
}

const CANCELLED = Symbol('cancelled');
const GRACE_ELAPSED = Symbol('grace-elapsed');

/**
 * Runs one admitted task from `pending` to a terminal state. Whatever happens
 * inside the agent, the record leaves the registry and exactly one result
 * frame is emitted.
 */
export class TaskRunner {
  constructor(private readonly options: TaskRunnerOptions) {}

  /** Start the unit of work for `record` and keep a handle on it. */
  spawn(record: TaskRecord): Promise<void> {
    const work = this.run(record).catch((error: unknown) => {
      this.options.logger.error('Task runner crashed', { taskKey: record.key, error: errorMessage(error) });
    });
    record.work = work;
    return work;
  }

  async run(record: TaskRecord): Promise<void> {
    const { driver, registry, cancellation, telemetry, logger } = this.options;
    const key = record.key;
    let status: TaskStatus = 'failed';
    let outcome: TaskOutcome = summariseFailure('');

    try {
      registry.transition(record, 'running');
      logger.info('Task started', { taskKey: key, requestId: record.requestId });
      await telemetry.emitToolCall(key, 'browser_agent_start', `Starting task: ${record.prompt}`, 'in_progress');

      const session = driver.createSession(key);
      record.session = session;
      const agent = driver.createAgent({ task: record.prompt, taskKey: key, session });
      record.agent = new WeakRef(agent);

      cancellation.checkpoint(key);
      await session.start();
      cancellation.checkpoint(key);

      const result = await this.execute(record, agent);
      outcome = summariseRunResult(result);
      status = 'completed';
    } catch (error) {
      if (this.isCancellation(record, error)) {
        status = 'cancelled';
        outcome = cancelledOutcome();
        logger.info('Task cancelled', { taskKey: key });
        await telemetry.emitToolCall(key, 'browser_agent_cancelled', CANCELLED_CONTENT, 'cancelled');
      } else {
        const message = errorMessage(error);
        status = 'failed';
        outcome = summariseFailure(message);
        logger.error('Task failed', { taskKey: key, error: message });
        await telemetry.emitToolCall(key, 'browser_agent_error', `Error: ${message}`, 'failed');
      }
    } finally {
      await this.finish(record, status, outcome);
    }
  }

  private async execute(record: TaskRecord, agent: AutomationAgent): Promise<AgentRunResult | null | undefined> {
    const run = agent.run(this.createContext(record));
    const winner = await Promise.race([
      run,
      this.options.cancellation.whenCancelled(record).then((): typeof CANCELLED => CANCELLED),
    ]);

    if (winner === CANCELLED) {
      await this.drain(record, run);
      throw new TaskCancelledError(record.key);
    }
    // An agent that obeyed its stop flag returns normally before the token is aborted.
    if (record.abort.signal.aborted || this.options.cancellation.isRequested(record.key)) {
      throw new TaskCancelledError(record.key);
    }
    return winner;
  }

  /** Give a cancelled agent up to `cancelGraceMs` to return. */
  private async drain(record: TaskRecord, run: Promise<unknown>): Promise<void> {
    const { settings, logger } = this.options;
    const settled = run.then(
      () => undefined,
      (error: unknown) => {
        logger.debug('Cancelled agent exited with error', { taskKey: record.key, error: errorMessage(error) });
      },
    );

    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<typeof GRACE_ELAPSED>((resolve) => {
      timer = setTimeout(() => resolve(GRACE_ELAPSED), settings.cancelGraceMs);
    });
    try {
      const winner = await Promise.race([settled, grace]);
      if (winner === GRACE_ELAPSED) {
        logger.warn('Cancelled agent did not return in time', { taskKey: record.key, graceMs: settings.cancelGraceMs });
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private createContext(record: TaskRecord): AgentRunContext {
    const { cancellation, intervention, telemetry } = this.options;
    const key = record.key;

    return {
      taskKey: key,
      signal: record.abort.signal,
      checkpoint: () => cancellation.checkpoint(key),
      reportToolCall: async (name, details = '', toolStatus = 'in_progress') => {
        cancellation.checkpoint(key);
        await telemetry.emitToolCall(key, name, details, toolStatus);
      },
      requestIntervention: async (reason) => {
        cancellation.checkpoint(key);
        const result = await intervention.request(key, reason, record.abort.signal);
        if (result.status === 'cancelled') {
          cancellation.checkpoint(key);
        }
        return result;
      },
    };
  }

  private isCancellation(record: TaskRecord, error: unknown): boolean {
    return (
      error instanceof TaskCancelledError ||
      record.abort.signal.aborted ||
      this.options.cancellation.isRequested(record.key)
    );
  }

  private async finish(record: TaskRecord, status: TaskStatus, outcome: TaskOutcome): Promise<void> {
    const { registry, cancellation, telemetry, logger, events } = this.options;
    const key = record.key;

    if (record.session) {
      try {
        await record.session.close();
      } catch (error) {
        logger.warn('Browser session close failed', { taskKey: key, error: errorMessage(error) });
      }
    }

    // Never-started records can only fail.
    const terminal: TaskStatus = record.status === 'running' ? status : 'failed';
    if (record.status === 'running' || record.status === 'pending') {
      registry.transition(record, terminal);
    }
    record.outcome = outcome;
    registry.complete(key, record);
    cancellation.settle(key);

    await telemetry.emitResult(key, outcome);
    events?.publish('task:finished', { taskKey: key, status: record.status, success: outcome.success });
    logger.info('Task finished', { taskKey: key, status: record.status, success: outcome.success });
  }
}
