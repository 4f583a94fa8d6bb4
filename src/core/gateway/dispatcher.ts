import { randomUUID } from 'node:crypto';
import { errorMessage } from '../errors.js';
import type { EventBus } from '../kernel/event-bus.js';
import type { RuntimeConfig, StructuredLogger } from '../kernel/contracts.js';
import type { CancellationCoordinator, CancelReport } from '../tasks/cancellation.js';
import type { InterventionRendezvous } from '../tasks/intervention.js';
import type { TaskRegistry } from '../tasks/task-registry.js';
import type { TaskRunner } from '../tasks/task-runner.js';
import type { TaskAdmission } from '../tasks/types.js';
import { parseInboundFrame, type AckFrame } from './protocol.js';

/** Sends an acknowledgement back on the socket the frame came from. */
export type Reply = (frame: AckFrame) => Promise<void>;

/** Lifecycle hooks the dispatcher triggers on the owning relay. */
export interface RelayControl {
  stop: () => Promise<void>;
  restart: () => Promise<void>;
}

export interface MessageDispatcherOptions {
  registry: TaskRegistry;
  runner: TaskRunner;
  cancellation: CancellationCoordinator;
  intervention: InterventionRendezvous;
  control: RelayControl;
  settings: RuntimeConfig['tasks'];
  logger: StructuredLogger;
  events?: EventBus;
  createRequestId?: () => string;
}

function describeCancel(report: CancelReport, key: string | undefined): string {
  if (report.scope === 'all') {
    return 'Cancellation requested for all tasks';
  }
  if (report.fallback) {
    return `No active task for tab ${key ?? ''}; cancellation requested for all tasks`;
  }
  if (report.matched.length === 0) {
    return `No active task for tab ${key ?? ''}`;
  }
  return `Cancellation requested for tab ${key ?? ''}`;
}

/**
 * Classifies inbound frames and routes them to admission, cancellation,
 * intervention or relay lifecycle. Errors are answered, never rethrown.
 */
export class MessageDispatcher {
  private readonly createRequestId: () => string;

  constructor(private readonly options: MessageDispatcherOptions) {
    this.createRequestId = options.createRequestId ?? randomUUID;
  }

  async handle(raw: string, reply: Reply): Promise<void> {
    const { logger, settings } = this.options;

    try {
      const message = parseInboundFrame(raw);
      logger.debug('Inbound frame', { kind: message.kind });

      switch (message.kind) {
        case 'run':
          await this.admit(
            {
              key: message.frame.tab_id ?? settings.defaultKey,
              prompt: message.frame.prompt ?? '',
              requestId: message.frame.id ?? this.createRequestId(),
            },
            'Browser agent task started',
            reply,
          );
          return;
        case 'chat':
        case 'task_text':
          await this.admit(
            { key: settings.defaultKey, prompt: message.text, requestId: this.createRequestId() },
            'Task started',
            reply,
          );
          return;
        case 'kill': {
          const key = message.frame.tab_id;
          const report = await this.options.cancellation.requestCancel(
            key ? { scope: 'task', key } : { scope: 'all' },
          );
          await reply({
            status: 'ok',
            message: describeCancel(report, key),
            ...(key ? { tab_id: key } : {}),
          });
          return;
        }
        case 'intervention_complete':
          if (this.options.intervention.complete(message.frame.intervention_id)) {
            await reply({ status: 'ok', message: 'Intervention completed' });
          }
          return;
        case 'end_connection':
          logger.info('End of connection requested');
          await this.options.control.stop();
          return;
        case 'restart_server':
          await reply({ status: 'ok', message: 'Server restarting' });
          await this.options.control.restart();
          return;
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.error('Error processing message', { error: message });
      try {
        await reply({ status: 'error', message: `Server error processing message: ${message}` });
      } catch (replyError) {
        logger.debug('Error reply could not be sent', { error: errorMessage(replyError) });
      }
    }
  }

  private async admit(input: TaskAdmission, startedMessage: string, reply: Reply): Promise<void> {
    const { registry, runner, logger, events } = this.options;
    const admission = registry.admit(input);

    if (!admission.accepted) {
      logger.info('Duplicate task request rejected', { taskKey: input.key, requestId: input.requestId });
      events?.publish('task:rejected', { taskKey: input.key, requestId: input.requestId });
      await reply({
        status: 'duplicate',
        message: `Browser agent already processing task for tab ${input.key}`,
        tab_id: input.key,
        request_id: input.requestId,
      });
      return;
    }

    events?.publish('task:admitted', { taskKey: input.key, requestId: input.requestId });
    // Spawn even when the ack fails: the record is already registered.
    try {
      await reply({
        status: 'processing',
        message: startedMessage,
        tab_id: input.key,
        request_id: input.requestId,
      });
    } finally {
      void runner.spawn(admission.record);
    }
  }
}
