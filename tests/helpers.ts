import { mkdtemp, rm } from 'node:fs/promises';
import { createServer, type Server } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import WebSocket from 'ws';
import { ConnectionLostError } from '../src/core/errors.js';
import { ConnectionHandle } from '../src/core/gateway/connection.js';
import type { OutboundFrame } from '../src/core/gateway/protocol.js';
import type {
  AgentDriver,
  AgentRunContext,
  AgentRunResult,
  AgentState,
  AutomationAgent,
  BrowserSession,
  RuntimeConfig,
  StructuredLogger,
} from '../src/core/kernel/contracts.js';

export function noopLogger(): StructuredLogger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
  };
}

export function defaultRuntimeConfig(): RuntimeConfig {
  return {
    gateway: { host: '127.0.0.1', port: 0, bindRetries: 2, bindBackoffMs: 10 },
    reclaim: { connectTimeoutMs: 500, gracefulWaitMs: 50, forceWaitMs: 20 },
    tasks: {
      defaultKey: 'current',
      maxAgentFailures: 3,
      cancelGraceMs: 500,
      escalationStepTimeoutMs: 100,
      untargetedKill: 'global',
    },
    intervention: { timeoutMs: 5_000 },
    agent: { driver: 'dry-run', options: {} },
    logging: { level: 'error' },
  };
}

export async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'tabrelay-test-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export async function waitForCondition(
  condition: () => boolean,
  timeoutMs = 2_000,
  intervalMs = 10,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
}

// ---------------------------------------------------------------------------
// Connection stand-in
// ---------------------------------------------------------------------------

/** Records frames instead of writing them to a socket. */
export class RecordingConnection extends ConnectionHandle {
  readonly frames: OutboundFrame[] = [];
  online = true;
  failSends = false;

  constructor() {
    super(noopLogger());
  }

  get connected(): boolean {
    return this.online;
  }

  async send(frame: OutboundFrame): Promise<void> {
    if (!this.online || this.failSends) {
      throw new ConnectionLostError('socket closed');
    }
    this.frames.push(frame);
  }
}

// ---------------------------------------------------------------------------
// Fake driver
// ---------------------------------------------------------------------------

export type FakeScript = (context: AgentRunContext, agent: FakeAgent) => Promise<AgentRunResult | null | undefined>;

export class FakeAgent implements AutomationAgent {
  readonly state: AgentState = { stopped: false, consecutiveFailures: 0 };
  stopCalls = 0;

  constructor(
    readonly task: string,
    private readonly script: FakeScript,
  ) {}

  run(context: AgentRunContext): Promise<AgentRunResult | null | undefined> {
    return this.script(context, this);
  }

  stop(): void {
    this.stopCalls++;
  }
}

export class FakeSession implements BrowserSession {
  started = false;
  closed = false;
  aborts = 0;
  /** How long `abortCurrentOperation` takes to return. */
  abortDelayMs = 0;

  constructor(readonly taskKey: string) {}

  async start(): Promise<void> {
    this.started = true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async abortCurrentOperation(): Promise<void> {
    this.aborts++;
    if (this.abortDelayMs > 0) {
      await delay(this.abortDelayMs);
    }
  }
}

export interface FakeDriver extends AgentDriver {
  agents: FakeAgent[];
  sessions: FakeSession[];
}

export function createFakeDriver(script: FakeScript): FakeDriver {
  const agents: FakeAgent[] = [];
  const sessions: FakeSession[] = [];
  return {
    id: 'fake',
    agents,
    sessions,
    createSession: (taskKey) => {
      const session = new FakeSession(taskKey);
      sessions.push(session);
      return session;
    },
    createAgent: ({ task }) => {
      const agent = new FakeAgent(task, script);
      agents.push(agent);
      return agent;
    },
  };
}

/** Runs until the task's token is aborted. */
export const hangUntilCancelled: FakeScript = async (context) => {
  await untilAborted(context.signal);
  return { content: 'should not be used', success: true };
};

// ---------------------------------------------------------------------------
// WebSocket test client
// ---------------------------------------------------------------------------

export type Frame = Record<string, unknown>;

export class TestClient {
  readonly frames: Frame[] = [];
  private waiters: Array<() => void> = [];

  private constructor(readonly socket: WebSocket) {
    socket.on('message', (data) => {
      const parsed: unknown = JSON.parse(String(data));
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        this.frames.push({ ...parsed });
      }
      for (const waiter of this.waiters) waiter();
    });
  }

  static connect(port: number): Promise<TestClient> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(`ws://127.0.0.1:${port}`);
      socket.once('open', () => resolve(new TestClient(socket)));
      socket.once('error', reject);
    });
  }

  send(payload: Frame | string): void {
    this.socket.send(typeof payload === 'string' ? payload : JSON.stringify(payload));
  }

  /** Resolve with the first received frame matching `predicate`. */
  async waitFor(predicate: (frame: Frame) => boolean, timeoutMs = 3_000): Promise<Frame> {
    const existing = this.frames.find(predicate);
    if (existing) return existing;

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((item) => item !== check);
        reject(new Error(`No matching frame within ${timeoutMs}ms: ${JSON.stringify(this.frames)}`));
      }, timeoutMs);
      const check = (): void => {
        const match = this.frames.find(predicate);
        if (!match) return;
        clearTimeout(timer);
        this.waiters = this.waiters.filter((item) => item !== check);
        resolve(match);
      };
      this.waiters.push(check);
    });
  }

  waitForClose(timeoutMs = 3_000): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error('socket did not close')), timeoutMs);
      this.socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  close(): void {
    this.socket.terminate();
  }
}

// ---------------------------------------------------------------------------
// Ports
// ---------------------------------------------------------------------------

/** Bind a throwaway TCP listener on an ephemeral loopback port. */
export function listenOnEphemeralPort(): Promise<{ server: Server; port: number }> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('no address'));
        return;
      }
      resolve({ server, port: address.port });
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close(() => resolve());
  });
}
