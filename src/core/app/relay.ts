import type { WebSocket } from 'ws';
import { errorMessage } from '../errors.js';
import type { EventBus } from '../kernel/event-bus.js';
import type { AgentDriver, RuntimeConfig, StructuredLogger } from '../kernel/contracts.js';
import { ConnectionHandle, rawDataToString, sendFrame } from '../gateway/connection.js';
import { MessageDispatcher, type RelayControl, type Reply } from '../gateway/dispatcher.js';
import { PortReclaimer, type ReclaimReport } from '../gateway/port-reclaimer.js';
import { RelayGateway, type HealthStatus } from '../gateway/server.js';
import { TelemetryEmitter } from '../gateway/telemetry.js';
import { CancellationCoordinator } from '../tasks/cancellation.js';
import { InterventionRendezvous } from '../tasks/intervention.js';
import { TaskRegistry } from '../tasks/task-registry.js';
import { TaskRunner } from '../tasks/task-runner.js';

export interface RelayDependencies {
  config: RuntimeConfig;
  logger: StructuredLogger;
  events: EventBus;
  driver: AgentDriver;
  reclaimer?: PortReclaimer;
}

export interface RelayStartOptions {
  /** Free the port from a previous instance before binding. */
  reclaim?: boolean;
}

type RelayState = 'idle' | 'running' | 'restarting' | 'stopping' | 'stopped';

/**
 * One orchestrator instance: owns the connection, the task and intervention
 * state and the listening socket. Nothing here is process-global.
 */
export class Relay implements RelayControl {
  readonly connection: ConnectionHandle;
  readonly telemetry: TelemetryEmitter;
  readonly registry: TaskRegistry;
  readonly cancellation: CancellationCoordinator;
  readonly intervention: InterventionRendezvous;
  readonly runner: TaskRunner;
  readonly dispatcher: MessageDispatcher;
  readonly gateway: RelayGateway;
  readonly reclaimer: PortReclaimer;

  /** Resolves once the relay has stopped for good. */
  readonly closed: Promise<void>;

  private state: RelayState = 'idle';
  private stopping: Promise<void> | null = null;
  private failure: Error | null = null;
  private markClosed: () => void = () => undefined;

  constructor(private readonly deps: RelayDependencies) {
    const { config, logger, events, driver } = deps;
    const settings = config.tasks;

    this.closed = new Promise((resolve) => {
      this.markClosed = resolve;
    });

    this.connection = new ConnectionHandle(logger);
    this.telemetry = new TelemetryEmitter(this.connection, logger);
    this.registry = new TaskRegistry();
    this.cancellation = new CancellationCoordinator({ registry: this.registry, settings, logger, events });
    this.intervention = new InterventionRendezvous({
      connection: this.connection,
      logger,
      timeoutMs: config.intervention.timeoutMs,
      events,
    });
    this.runner = new TaskRunner({
      driver,
      registry: this.registry,
      cancellation: this.cancellation,
      intervention: this.intervention,
      telemetry: this.telemetry,
      settings,
      logger,
      events,
    });
    this.dispatcher = new MessageDispatcher({
      registry: this.registry,
      runner: this.runner,
      cancellation: this.cancellation,
      intervention: this.intervention,
      control: this,
      settings,
      logger,
      events,
    });
    this.gateway = new RelayGateway({
      host: config.gateway.host,
      port: config.gateway.port,
      bindRetries: config.gateway.bindRetries,
      bindBackoffMs: config.gateway.bindBackoffMs,
      logger,
      healthProvider: () => this.health(),
      onConnection: (socket, remote) => this.acceptConnection(socket, remote),
    });
    this.reclaimer = deps.reclaimer ?? new PortReclaimer({
      host: config.gateway.host,
      settings: config.reclaim,
      logger,
    });
  }

  get port(): number {
    return this.gateway.port;
  }

  /** The error that stopped the relay on its own, if any. Set before `closed` resolves. */
  get fatalError(): Error | null {
    return this.failure;
  }

  /**
   * Bind the gateway. With `reclaim`, a previous instance holding the port is
   * asked to leave, then terminated.
   *
   * @throws PortBindExhaustedError when the port stays unavailable.
   */
  async start(options: RelayStartOptions = {}): Promise<ReclaimReport | null> {
    if (this.state !== 'idle') {
      throw new Error(`Relay cannot start from state ${this.state}`);
    }

    let report: ReclaimReport | null = null;
    if (options.reclaim) {
      report = await this.reclaimer.ensureAvailable(this.deps.config.gateway.port);
    }

    await this.gateway.start();
    this.state = 'running';
    this.deps.events.publish('gateway:listening', { host: this.deps.config.gateway.host, port: this.port });
    return report;
  }

  /** Cancel live tasks, close the operator socket and the listener. Idempotent. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /** Cancel every task, close the listener and bind the same port again. */
  async restart(): Promise<void> {
    if (this.state !== 'running') {
      this.deps.logger.warn('Restart ignored', { state: this.state });
      return;
    }
    this.state = 'restarting';
    const port = this.port;
    this.deps.logger.info('Relay restarting', { port });

    try {
      await this.drainTasks();
      this.connection.close(1012, 'server restarting');
      await this.gateway.stop();
      await this.reclaimer.ensureAvailable(port);
      await this.gateway.start(port);
      this.state = 'running';
    } catch (error) {
      this.deps.logger.error('Relay restart failed', { error: errorMessage(error) });
      this.failure = error instanceof Error ? error : new Error(errorMessage(error));
      await this.stop();
      throw error;
    }
  }

  health(): HealthStatus {
    const tasks = this.registry.snapshot();
    return {
      status: 'ok',
      connected: this.connection.connected,
      activeTasks: tasks.length,
      pendingInterventions: this.intervention.pending().length,
      tasks,
    };
  }

  private async shutdown(): Promise<void> {
    const { logger } = this.deps;
    this.state = 'stopping';
    logger.info('Relay stopping');

    try {
      await this.drainTasks();
      this.connection.close();
      await this.gateway.stop();
    } finally {
      this.state = 'stopped';
      this.markClosed();
      logger.info('Relay stopped');
    }
  }

  /** Cancel every live task and wait, bounded, for their units of work. */
  private async drainTasks(): Promise<void> {
    const settings = this.deps.config.tasks;
    const live = this.registry.active();
    if (live.length === 0) {
      return;
    }

    await this.cancellation.requestCancel({ scope: 'all' });
    const pending = live.flatMap((record) => (record.work ? [record.work] : []));
    const boundMs = settings.cancelGraceMs + settings.escalationStepTimeoutMs * 2;

    let timer: NodeJS.Timeout | undefined;
    const bound = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, boundMs);
    });
    try {
      await Promise.race([Promise.all(pending).then(() => undefined), bound]);
    } finally {
      clearTimeout(timer);
    }
  }

  private acceptConnection(socket: WebSocket, remote: string): void {
    const { logger, events } = this.deps;

    if (this.state !== 'running') {
      socket.close(1013, 'relay unavailable');
      return;
    }

    this.connection.attach(socket);
    logger.info('Operator connected', { remote });
    events.publish('gateway:connected', { remote });

    const reply: Reply = (frame) => sendFrame(socket, frame);

    socket.on('message', (data) => {
      void this.dispatcher.handle(rawDataToString(data), reply);
    });
    socket.on('error', (error) => {
      logger.warn('Operator socket error', { remote, error: error.message });
    });
    socket.on('close', () => {
      if (this.connection.detach(socket)) {
        logger.info('Operator disconnected', { remote });
        events.publish('gateway:disconnected', { remote });
      }
    });
  }
}
