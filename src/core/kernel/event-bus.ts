import { EventEmitter } from 'node:events';
import type { JsonValue } from './contracts.js';

/**
 * Known relay event types and their payload shapes.
 *
 * Drivers can extend this map via declaration merging for type safety:
 *
 * ```ts
 * declare module '../core/kernel/event-bus.js' {
 *   interface EventMap { 'driver:step': { taskKey: string; step: number } }
 * }
 * ```
 */
export interface EventMap {
  'task:admitted': { taskKey: string; requestId: string | null };
  'task:rejected': { taskKey: string; requestId: string | null };
  'task:finished': { taskKey: string; status: string; success: boolean };
  'task:cancel_requested': { scope: string; matched: string[]; fallback: boolean };
  'intervention:requested': { interventionId: string; taskKey: string; reason: string };
  'intervention:resolved': { interventionId: string; taskKey: string; status: string };
  'gateway:connected': { remote: string };
  'gateway:disconnected': { remote: string };
  'gateway:listening': { host: string; port: number };
}

export type KnownEventType = keyof EventMap;

export interface EventEnvelope<T = Record<string, JsonValue>> {
  type: string;
  payload: T;
  at: string;
}

const ALL_EVENTS = '__all__';

export class EventBus {
  private readonly emitter = new EventEmitter();

  /** Publish a known event with typed payload. */
  publish<K extends KnownEventType>(type: K, payload: EventMap[K]): void;
  /** Publish a custom/driver-defined event. */
  publish(type: string, payload: Record<string, JsonValue>): void;
  publish(type: string, payload: Record<string, JsonValue>): void {
    const envelope: EventEnvelope = {
      type,
      payload,
      at: new Date().toISOString()
    };

    this.emitter.emit(type, envelope);
    this.emitter.emit(ALL_EVENTS, envelope);
  }

  /** Subscribe to a known event with typed envelope. */
  subscribe<K extends KnownEventType>(type: K, listener: (event: EventEnvelope<EventMap[K]>) => void): () => void;
  /** Subscribe to a custom/driver-defined event. */
  subscribe(type: string, listener: (event: EventEnvelope) => void): () => void;
  subscribe(type: string, listener: (event: EventEnvelope) => void): () => void {
    this.emitter.on(type, listener);
    return () => this.emitter.off(type, listener);
  }

  subscribeAll(listener: (event: EventEnvelope) => void): () => void {
    this.emitter.on(ALL_EVENTS, listener);
    return () => this.emitter.off(ALL_EVENTS, listener);
  }
}
