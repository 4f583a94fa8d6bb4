import { setTimeout as delay } from 'node:timers/promises';
import type {
  AgentDriver,
  AgentDriverFactory,
  AgentRunContext,
  AgentRunResult,
  AgentState,
  AutomationAgent,
  BrowserSession,
  JsonValue,
  StructuredLogger,
} from '../kernel/contracts.js';

export const DRY_RUN_DRIVER_ID = 'dry-run';

interface DryRunStep {
  name: string;
  details: string;
}

export interface DryRunOptions {
  stepDelayMs: number;
  steps: DryRunStep[];
  /** When set, the agent asks the operator for help before its last step. */
  interventionReason?: string;
}

const DEFAULT_STEPS: DryRunStep[] = [
  { name: 'go_to_url', details: 'Opening the requested page' },
  { name: 'click_element', details: 'index: Continue' },
  { name: 'extract_content', details: 'Reading page content' },
];

function readNumber(value: JsonValue | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function readSteps(value: JsonValue | undefined): DryRunStep[] {
  if (!Array.isArray(value)) {
    return DEFAULT_STEPS;
  }
  const steps: DryRunStep[] = [];
  for (const item of value) {
    if (typeof item === 'string') {
      steps.push({ name: item, details: '' });
    } else if (item && typeof item === 'object' && !Array.isArray(item) && typeof item.name === 'string') {
      steps.push({ name: item.name, details: typeof item.details === 'string' ? item.details : '' });
    }
  }
  return steps;
}

export function parseDryRunOptions(options: Record<string, JsonValue>): DryRunOptions {
  const reason = options.interventionReason;
  return {
    stepDelayMs: readNumber(options.stepDelayMs, 250),
    steps: readSteps(options.steps),
    ...(typeof reason === 'string' && reason ? { interventionReason: reason } : {}),
  };
}

class DryRunSession implements BrowserSession {
  constructor(
    private readonly taskKey: string,
    private readonly logger: StructuredLogger,
  ) {}

  async start(): Promise<void> {
    this.logger.debug('Dry-run session started', { taskKey: this.taskKey });
  }

  async close(): Promise<void> {
    this.logger.debug('Dry-run session closed', { taskKey: this.taskKey });
  }

  abortCurrentOperation(): void {
    this.logger.debug('Dry-run page operation aborted', { taskKey: this.taskKey });
  }
}

class DryRunAgent implements AutomationAgent {
  readonly state: AgentState = { stopped: false, consecutiveFailures: 0 };

  constructor(
    private readonly task: string,
    private readonly options: DryRunOptions,
  ) {}

  async run(context: AgentRunContext): Promise<AgentRunResult> {
    const { steps, stepDelayMs, interventionReason } = this.options;

    for (const [index, step] of steps.entries()) {
      if (interventionReason && index === steps.length - 1) {
        const outcome = await context.requestIntervention(interventionReason);
        if (!outcome.success) {
          return { content: outcome.message, success: false };
        }
      }

      await context.reportToolCall(step.name, step.details, 'in_progress');
      await delay(stepDelayMs, undefined, { signal: context.signal });
      if (this.state.stopped) {
        return { content: 'Stopped', success: false };
      }
      await context.reportToolCall(step.name, step.details, 'completed');
    }

    return { content: `Dry run finished: ${this.task}`, success: true };
  }

  stop(): void {
    this.state.stopped = true;
  }
}

/** Walks through a fixed list of steps without touching a browser. */
export const createDryRunDriver: AgentDriverFactory = ({ options, logger }): AgentDriver => {
  const parsed = parseDryRunOptions(options);
  return {
    id: DRY_RUN_DRIVER_ID,
    createSession: (taskKey) => new DryRunSession(taskKey, logger),
    createAgent: ({ task }) => new DryRunAgent(task, parsed),
  };
};
