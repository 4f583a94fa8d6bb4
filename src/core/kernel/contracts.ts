/**
 * @module contracts
 *
 * Central type definitions shared by the relay subsystems: JSON values, the
 * structured logger, the resolved runtime configuration and the contracts of
 * the external collaborators (agent driver, automation agent, browser session).
 *
 * @see {@link RuntimeConfig} - Resolved runtime configuration
 * @see {@link AgentDriver} - Factory for sessions and agents
 * @see {@link AgentRunContext} - Cancellation and reporting context threaded through a run
 */

/** Recursive JSON-compatible value type used throughout the relay. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Minimal structured logger every subsystem receives. */
export interface StructuredLogger {
  debug: (message: string, fields?: Record<string, JsonValue>) => void;
  info: (message: string, fields?: Record<string, JsonValue>) => void;
  warn: (message: string, fields?: Record<string, JsonValue>) => void;
  error: (message: string, fields?: Record<string, JsonValue>) => void;
}

/** Policy applied when a targeted kill finds no live task for its key. */
export type UntargetedKillPolicy = 'global' | 'ignore';

/** Fully merged and validated runtime configuration. */
export interface RuntimeConfig {
  gateway: {
    host: string;
    port: number;
    /** Bind attempts before startup is aborted. */
    bindRetries: number;
    /** Fixed pause between bind attempts. */
    bindBackoffMs: number;
  };
  reclaim: {
    /** How long the graceful `end_connection` client waits for the socket to open. */
    connectTimeoutMs: number;
    /** Pause after the graceful request before the port is probed again. */
    gracefulWaitMs: number;
    /** Pause between SIGTERM and SIGKILL when the owner has to be terminated. */
    forceWaitMs: number;
  };
  tasks: {
    /** Task key used when a request carries none. */
    defaultKey: string;
    /** Failure threshold of the agent; cancellation pushes the counter past it. */
    maxAgentFailures: number;
    /** Upper bound on waiting for a cancelled agent to return. */
    cancelGraceMs: number;
    /** Upper bound on each escalation step (abort page operation, agent stop). */
    escalationStepTimeoutMs: number;
    untargetedKill: UntargetedKillPolicy;
  };
  intervention: {
    timeoutMs: number;
  };
  agent: {
    /** `dry-run` or a path to a module exporting an agent driver factory. */
    driver: string;
    options: Record<string, JsonValue>;
  };
  logging: {
    level: LogLevel;
  };
}

/** Overrides collected from the command line. */
export interface RuntimeFlags {
  configPath?: string;
  host?: string;
  port?: number;
  driver?: string;
  logLevel?: LogLevel;
}

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export type ToolCallStatus = 'in_progress' | 'completed' | 'failed' | 'cancelled';

export type InterventionStatus = 'completed' | 'cancelled' | 'timeout' | 'failed';

export interface InterventionOutcome {
  interventionId: string | null;
  status: InterventionStatus;
  success: boolean;
  message: string;
}

/** Mutable agent state the relay reaches into when it cancels a run. */
export interface AgentState {
  stopped: boolean;
  consecutiveFailures: number;
}

/** What an agent returns from `run()`; every field is optional. */
export interface AgentRunResult {
  content?: string | null;
  success?: boolean | null;
}

/**
 * Context handed to {@link AutomationAgent.run}. Agents call `checkpoint()`
 * (or `reportToolCall()`, which checkpoints first) between steps; both throw
 * once the task is cancelled.
 *
 * Cancellation is cooperative: while the agent sits inside a browser call
 * that cannot be interrupted, the relay only reclaims the task after that
 * call returns or fails.
 */
export interface AgentRunContext {
  readonly taskKey: string;
  readonly signal: AbortSignal;
  checkpoint: () => void;
  reportToolCall: (name: string, details?: string, status?: ToolCallStatus) => Promise<void>;
  requestIntervention: (reason?: string) => Promise<InterventionOutcome>;
}

export interface AutomationAgent {
  readonly state: AgentState;
  run: (context: AgentRunContext) => Promise<AgentRunResult | null | undefined>;
  stop: () => void | Promise<void>;
}

export interface BrowserSession {
  start: () => Promise<void>;
  close: () => Promise<void>;
  /** Abort whatever page operation is in flight. */
  abortCurrentOperation: () => void | Promise<void>;
}

export interface CreateAgentInput {
  task: string;
  taskKey: string;
  session: BrowserSession;
}

/** Produces one browser session and one agent per admitted task. */
export interface AgentDriver {
  readonly id: string;
  createSession: (taskKey: string) => BrowserSession;
  createAgent: (input: CreateAgentInput) => AutomationAgent;
}

export interface AgentDriverFactoryInput {
  options: Record<string, JsonValue>;
  logger: StructuredLogger;
}

export type AgentDriverFactory = (input: AgentDriverFactoryInput) => AgentDriver;
