import { createServer } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import WebSocket from 'ws';
import { errorMessage } from '../errors.js';
import type { RuntimeConfig, StructuredLogger } from '../kernel/contracts.js';
import {
  createPortOwnerLookup,
  createProcessTerminator,
  isProcessRunning,
  type PortOwnerLookup,
  type ProcessTerminator,
} from '../utils/port-owner.js';

export interface ReclaimReport {
  port: number;
  /** Whether the port was bound when reclamation started. */
  wasBound: boolean;
  /** Whether the graceful `end_connection` request reached a listener. */
  gracefulDelivered: boolean;
  /** Pids signalled during this call. */
  terminated: number[];
  available: boolean;
  error?: string;
}

export interface PortReclaimerOptions {
  host: string;
  settings: RuntimeConfig['reclaim'];
  logger: StructuredLogger;
  lookup?: PortOwnerLookup;
  terminate?: ProcessTerminator;
  isAlive?: (pid: number) => boolean;
  selfPid?: number;
}

function connectHost(host: string): string {
  return host === '0.0.0.0' || host === '::' ? '127.0.0.1' : host;
}

/**
 * Frees the listening port left behind by an earlier relay: first by asking
 * it to shut down over the wire, then by signalling the owning process.
 */
export class PortReclaimer {
  private readonly lookup: PortOwnerLookup;
  private readonly terminate: ProcessTerminator;
  private readonly isAlive: (pid: number) => boolean;
  private readonly selfPid: number;
  private readonly signalled = new Set<number>();

  constructor(private readonly options: PortReclaimerOptions) {
    this.lookup = options.lookup ?? createPortOwnerLookup();
    this.terminate = options.terminate ?? createProcessTerminator();
    this.isAlive = options.isAlive ?? isProcessRunning;
    this.selfPid = options.selfPid ?? process.pid;
  }

  /** Probe-bind `port`; any bind failure counts as bound. */
  isBound(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const probe = createServer();
      probe.once('error', () => resolve(true));
      probe.once('listening', () => {
        probe.close(() => resolve(false));
      });
      probe.listen({ port, host: this.options.host, exclusive: true });
    });
  }

  async ensureAvailable(port: number): Promise<ReclaimReport> {
    const report: ReclaimReport = {
      port,
      wasBound: false,
      gracefulDelivered: false,
      terminated: [],
      available: false,
    };

    try {
      if (!(await this.isBound(port))) {
        report.available = true;
        return report;
      }
      report.wasBound = true;

      report.gracefulDelivered = await this.requestGracefulShutdown(port);
      await sleep(this.options.settings.gracefulWaitMs);
      if (!(await this.isBound(port))) {
        report.available = true;
        return report;
      }

      await this.terminateOwners(port, report);
      report.available = !(await this.isBound(port));
    } catch (error) {
      report.error = errorMessage(error);
      this.options.logger.warn('Port reclamation failed', { port, error: report.error });
    }

    this.options.logger.info('Port reclamation finished', {
      port,
      available: report.available,
      terminated: report.terminated,
    });
    return report;
  }

  private requestGracefulShutdown(port: number): Promise<boolean> {
    const { logger, settings } = this.options;
    const url = `ws://${connectHost(this.options.host)}:${port}`;

    return new Promise((resolve) => {
      const client = new WebSocket(url, { handshakeTimeout: settings.connectTimeoutMs });
      let settled = false;
      const done = (delivered: boolean): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(delivered);
      };
      const timer = setTimeout(() => {
        client.terminate();
        done(false);
      }, settings.connectTimeoutMs);

      client.once('open', () => {
        client.send(JSON.stringify({ type: 'end_connection' }), (error) => {
          if (error) {
            logger.debug('Graceful shutdown request failed', { url, error: error.message });
          }
          client.close();
          done(!error);
        });
      });
      client.on('error', (error) => {
        logger.debug('Graceful shutdown connect failed', { url, error: error.message });
        done(false);
      });
    });
  }

  private async terminateOwners(port: number, report: ReclaimReport): Promise<void> {
    const { logger, settings } = this.options;
    const owners = (await this.lookup(port)).filter((pid) => pid !== this.selfPid && !this.signalled.has(pid));
    if (owners.length === 0) {
      logger.warn('No reclaimable owner found for port', { port });
      return;
    }

    for (const pid of owners) {
      this.signalled.add(pid);
      if (await this.terminate(pid, 'SIGTERM')) {
        report.terminated.push(pid);
        logger.info('Sent SIGTERM to port owner', { port, pid });
      }
    }

    await sleep(settings.forceWaitMs);

    for (const pid of report.terminated) {
      if (this.isAlive(pid)) {
        await this.terminate(pid, 'SIGKILL');
        logger.warn('Escalated to SIGKILL', { port, pid });
      }
    }
  }
}
