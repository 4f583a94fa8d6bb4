import { describe, expect, test } from 'vitest';
import { parseInboundFrame, wireTimestamp } from '../src/core/gateway/protocol.js';

describe('parseInboundFrame', () => {
  test('classifies a browser agent request', () => {
    const raw = JSON.stringify({ type: 'browser_agent_request', prompt: 'open example.org', tab_id: 't1', id: 'r1' });
    expect(parseInboundFrame(raw)).toEqual({
      kind: 'run',
      frame: { type: 'browser_agent_request', prompt: 'open example.org', tab_id: 't1', id: 'r1' },
    });
  });

  test('a run request may omit prompt, tab and id', () => {
    expect(parseInboundFrame('{"type":"browser_agent_request"}')).toEqual({
      kind: 'run',
      frame: { type: 'browser_agent_request' },
    });
  });

  test('classifies kill requests with and without a tab', () => {
    expect(parseInboundFrame('{"type":"kill_agent","tab_id":"t2"}')).toEqual({
      kind: 'kill',
      frame: { type: 'kill_agent', tab_id: 't2' },
    });
    expect(parseInboundFrame('{"type":"kill_agent"}')).toEqual({
      kind: 'kill',
      frame: { type: 'kill_agent' },
    });
  });

  test('classifies lifecycle and intervention frames', () => {
    expect(parseInboundFrame('{"type":"human_intervention_complete","intervention_id":"i-1"}')).toEqual({
      kind: 'intervention_complete',
      frame: { type: 'human_intervention_complete', intervention_id: 'i-1' },
    });
    expect(parseInboundFrame('{"type":"end_connection"}')).toEqual({ kind: 'end_connection' });
    expect(parseInboundFrame('{"type":"restart_server"}')).toEqual({ kind: 'restart_server' });
  });

  test('regular chat carries its text, or the raw frame when it has none', () => {
    expect(parseInboundFrame('{"type":"regular_chat","regular_chat":"hello"}')).toEqual({
      kind: 'chat',
      text: 'hello',
    });
    expect(parseInboundFrame('{"type":"regular_chat"}')).toEqual({
      kind: 'chat',
      text: '{"type":"regular_chat"}',
    });
  });

  test('non-JSON text becomes task text', () => {
    expect(parseInboundFrame('not json at all')).toEqual({ kind: 'task_text', text: 'not json at all' });
  });

  test('unknown types and malformed control frames become task text', () => {
    expect(parseInboundFrame('{"type":"something_else"}')).toEqual({
      kind: 'task_text',
      text: '{"type":"something_else"}',
    });
    expect(parseInboundFrame('{"type":"human_intervention_complete"}')).toEqual({
      kind: 'task_text',
      text: '{"type":"human_intervention_complete"}',
    });
    expect(parseInboundFrame('[1,2]')).toEqual({ kind: 'task_text', text: '[1,2]' });
  });

  test('an empty tab id is not a valid request', () => {
    expect(parseInboundFrame('{"type":"browser_agent_request","tab_id":""}').kind).toBe('task_text');
  });
});

describe('wireTimestamp', () => {
  test('converts milliseconds to fractional seconds', () => {
    expect(wireTimestamp(1_700_000_000_500)).toBe(1_700_000_000.5);
  });
});
