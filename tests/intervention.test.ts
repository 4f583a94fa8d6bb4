import { describe, expect, test } from 'vitest';
import type { JsonValue, StructuredLogger } from '../src/core/kernel/contracts.js';
import { EventBus } from '../src/core/kernel/event-bus.js';
import { DEFAULT_INTERVENTION_REASON, InterventionRendezvous } from '../src/core/tasks/intervention.js';
import { RecordingConnection, noopLogger, waitForCondition } from './helpers.js';

function createRendezvous(
  connection: RecordingConnection,
  options: { timeoutMs?: number; events?: EventBus; logger?: StructuredLogger } = {},
): InterventionRendezvous {
  let next = 0;
  return new InterventionRendezvous({
    connection,
    logger: options.logger ?? noopLogger(),
    timeoutMs: options.timeoutMs ?? 5_000,
    events: options.events,
    clock: () => 1_700_000_000_000,
    createId: () => `i-${++next}`,
  });
}

describe('InterventionRendezvous', () => {
  test('sends a request and resolves when the operator completes it', async () => {
    const connection = new RecordingConnection();
    const rendezvous = createRendezvous(connection);

    const outcome = rendezvous.request('t1', 'Solve the captcha');
    await waitForCondition(() => connection.frames.length === 1);

    expect(connection.frames[0]).toEqual({
      type: 'human_intervention_required',
      intervention_id: 'i-1',
      reason: 'Solve the captcha',
      timestamp: 1_700_000_000,
    });
    expect(rendezvous.pending()).toEqual(['i-1']);

    expect(rendezvous.complete('i-1')).toBe(true);
    await expect(outcome).resolves.toEqual({
      interventionId: 'i-1',
      status: 'completed',
      success: true,
      message: 'Human intervention completed for: Solve the captcha',
    });
    expect(rendezvous.pending()).toEqual([]);
  });

  test('uses the default reason when none is given', async () => {
    const connection = new RecordingConnection();
    const rendezvous = createRendezvous(connection);

    const outcome = rendezvous.request('t1');
    await waitForCondition(() => connection.frames.length === 1);
    rendezvous.complete('i-1');

    expect(connection.frames[0]).toMatchObject({ reason: DEFAULT_INTERVENTION_REASON });
    await expect(outcome).resolves.toMatchObject({
      message: 'Human intervention completed for: Action requires human intervention',
    });
  });

  test('unknown and already-completed ids are ignored', async () => {
    const connection = new RecordingConnection();
    const rendezvous = createRendezvous(connection);
    expect(rendezvous.complete('nope')).toBe(false);

    const outcome = rendezvous.request('t1', 'Log in');
    await waitForCondition(() => connection.frames.length === 1);
    expect(rendezvous.complete('i-1')).toBe(true);
    await outcome;
    expect(rendezvous.complete('i-1')).toBe(false);
  });

  test('times out and forgets the request', async () => {
    const connection = new RecordingConnection();
    const warnings: Array<{ message: string; fields?: Record<string, JsonValue> }> = [];
    const logger = { ...noopLogger(), warn: (message: string, fields?: Record<string, JsonValue>) => warnings.push({ message, fields }) };
    const rendezvous = createRendezvous(connection, { timeoutMs: 20, logger });

    await expect(rendezvous.request('t1', 'Log in')).resolves.toEqual({
      interventionId: 'i-1',
      status: 'timeout',
      success: false,
      message: 'Timeout waiting for human intervention',
    });
    expect(rendezvous.pending()).toEqual([]);
    expect(warnings).toEqual([
      { message: 'Intervention timed out', fields: { interventionId: 'i-1', taskKey: 't1', timeoutMs: 20 } },
    ]);
    expect(rendezvous.complete('i-1')).toBe(false);
  });

  test('a cancelled task stops waiting', async () => {
    const connection = new RecordingConnection();
    const rendezvous = createRendezvous(connection);
    const controller = new AbortController();

    const outcome = rendezvous.request('t1', 'Log in', controller.signal);
    await waitForCondition(() => connection.frames.length === 1);
    controller.abort();

    await expect(outcome).resolves.toEqual({
      interventionId: 'i-1',
      status: 'cancelled',
      success: false,
      message: 'Intervention wait cancelled: Log in',
    });
    expect(rendezvous.pending()).toEqual([]);
  });

  test('an already-aborted signal resolves as cancelled', async () => {
    const connection = new RecordingConnection();
    const rendezvous = createRendezvous(connection);
    const controller = new AbortController();
    controller.abort();

    await expect(rendezvous.request('t1', 'Log in', controller.signal)).resolves.toMatchObject({
      status: 'cancelled',
    });
  });

  test('fails fast without a connection', async () => {
    const connection = new RecordingConnection();
    connection.online = false;
    const rendezvous = createRendezvous(connection);

    await expect(rendezvous.request('t1', 'Log in')).resolves.toEqual({
      interventionId: 'i-1',
      status: 'failed',
      success: false,
      message: 'No websocket connection available',
    });
    expect(connection.frames).toEqual([]);
    expect(rendezvous.pending()).toEqual([]);
  });

  test('reports a failed send', async () => {
    const connection = new RecordingConnection();
    connection.failSends = true;
    const rendezvous = createRendezvous(connection);

    await expect(rendezvous.request('t1', 'Log in')).resolves.toEqual({
      interventionId: 'i-1',
      status: 'failed',
      success: false,
      message: 'Failed to request intervention: socket closed',
    });
    expect(rendezvous.pending()).toEqual([]);
  });

  test('publishes requested and resolved events', async () => {
    const connection = new RecordingConnection();
    const events = new EventBus();
    const types: string[] = [];
    events.subscribeAll((event) => types.push(`${event.type}:${String(event.payload.status ?? '')}`));
    const rendezvous = createRendezvous(connection, { events });

    const outcome = rendezvous.request('t1', 'Log in');
    await waitForCondition(() => connection.frames.length === 1);
    rendezvous.complete('i-1');
    await outcome;

    expect(types).toEqual(['intervention:requested:', 'intervention:resolved:completed']);
  });
});
