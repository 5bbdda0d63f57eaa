import { EventEmitter } from 'node:events';

/**
 * Internal domain events and their payload shapes.
 *
 * Plugins extend this map via declaration merging:
 *
 * ```ts
 * declare module '../../core/kernel/event-bus.js' {
 *   interface EventMap { 'threads:deleted': { threadId: string } }
 * }
 * ```
 */
export interface EventMap {
  'kernel:started': { plugins: number };
  'kernel:stopping': Record<string, never>;
}

export type KnownEventType = keyof EventMap;

export interface EventEnvelope<T = unknown> {
  type: string;
  payload: T;
  at: string;
}

const ALL_EVENTS = '__all__';

export class EventBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    // One listener per plugin per event type, plus gateway bridges.
    this.emitter.setMaxListeners(100);
  }

  publish<K extends KnownEventType>(type: K, payload: EventMap[K]): void {
    const envelope: EventEnvelope<EventMap[K]> = {
      type,
      payload,
      at: new Date().toISOString()
    };

    this.emitter.emit(type, envelope);
    this.emitter.emit(ALL_EVENTS, envelope);
  }

  subscribe<K extends KnownEventType>(type: K, listener: (event: EventEnvelope<EventMap[K]>) => void): () => void {
    this.emitter.on(type, listener);
    return () => this.emitter.off(type, listener);
  }

  subscribeAll(listener: (event: EventEnvelope) => void): () => void {
    this.emitter.on(ALL_EVENTS, listener);
    return () => this.emitter.off(ALL_EVENTS, listener);
  }
}
