import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { setTimeout as sleep } from 'node:timers/promises';
import { WebSocketServer, type WebSocket } from 'ws';
import { PortBindExhaustedError, errorMessage } from '../errors.js';
import type { StructuredLogger } from '../kernel/contracts.js';
import type { TaskSnapshot } from '../tasks/types.js';

export interface HealthStatus {
  status: 'ok';
  connected: boolean;
  activeTasks: number;
  pendingInterventions: number;
  tasks: TaskSnapshot[];
}

export interface RelayGatewayOptions {
  host: string;
  port: number;
  bindRetries: number;
  bindBackoffMs: number;
  logger: StructuredLogger;
  healthProvider: () => HealthStatus;
  onConnection: (socket: WebSocket, remote: string) => void;
}

function json(res: ServerResponse, statusCode: number, payload: unknown): void {
  res.statusCode = statusCode;
  res.setHeader('content-type', 'application/json');
  res.end(`${JSON.stringify(payload)}\n`);
}

function remoteAddress(req: IncomingMessage): string {
  const { remoteAddress: address, remotePort: port } = req.socket;
  return address ? `${address}:${port ?? 0}` : 'unknown';
}

/**
 * Retries `bind` with a fixed backoff.
 *
 * @throws PortBindExhaustedError after `retries` failed attempts.
 */
export async function listenWithRetry(
  bind: () => Promise<void>,
  options: { port: number; retries: number; backoffMs: number; logger: StructuredLogger },
): Promise<void> {
  let lastError = '';
  for (let attempt = 1; attempt <= options.retries; attempt++) {
    try {
      await bind();
      return;
    } catch (error) {
      lastError = errorMessage(error);
      options.logger.warn('Gateway bind failed', {
        port: options.port,
        attempt,
        retries: options.retries,
        error: lastError,
      });
      if (attempt < options.retries) {
        await sleep(options.backoffMs);
      }
    }
  }
  throw new PortBindExhaustedError(options.port, options.retries, lastError);
}

export class RelayGateway {
  private server: Server | null = null;
  private ws: WebSocketServer | null = null;
  private boundPort: number | null = null;

  constructor(private readonly options: RelayGatewayOptions) {}

  /** The bound port, or the configured one before `start()`. */
  get port(): number {
    return this.boundPort ?? this.options.port;
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Bind `port` (default: the configured one), retrying per the bind settings. */
  async start(port: number = this.options.port): Promise<void> {
    const { host, bindRetries, bindBackoffMs, logger } = this.options;

    await listenWithRetry(() => this.bind(port), { port, retries: bindRetries, backoffMs: bindBackoffMs, logger });

    logger.info('Gateway started', { host, port: this.port });
  }

  async stop(): Promise<void> {
    const server = this.server;
    const ws = this.ws;
    this.server = null;
    this.ws = null;
    this.boundPort = null;

    if (ws) {
      for (const client of ws.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => ws.close(() => resolve()));
    }

    if (server) {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
      this.options.logger.info('Gateway stopped');
    }
  }

  private bind(port: number): Promise<void> {
    const server = createServer((req, res) => this.handleHttp(req, res));
    const ws = new WebSocketServer({ noServer: true });

    server.on('upgrade', (req, socket, head) => {
      ws.handleUpgrade(req, socket, head, (webSocket) => {
        ws.emit('connection', webSocket, req);
      });
    });

    ws.on('connection', (socket: WebSocket, req: IncomingMessage) => {
      this.options.onConnection(socket, remoteAddress(req));
    });

    return new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        ws.close();
        reject(error);
      };
      server.once('error', onError);
      server.listen(port, this.options.host, () => {
        server.off('error', onError);
        server.on('error', (error) => {
          this.options.logger.error('Gateway server error', { error: error.message });
        });
        const address = server.address();
        this.boundPort = address && typeof address === 'object' ? address.port : port;
        this.server = server;
        this.ws = ws;
        resolve();
      });
    });
  }

  private handleHttp(req: IncomingMessage, res: ServerResponse): void {
    if (req.method === 'GET' && req.url === '/health') {
      json(res, 200, this.options.healthProvider());
      return;
    }
    json(res, 404, { error: 'Not found' });
  }
}
