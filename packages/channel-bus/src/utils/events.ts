/**
 * Type-safe event emitter
 */
import { createLogger } from './logger.js';

const logger = createLogger('Events');

export type EventCallback<T> = (data: T) => void;

export type EventMap = Record<string, unknown>;

export class TypedEventEmitter<Events extends EventMap> {
  private listeners: { [K in keyof Events]?: Set<EventCallback<Events[K]>> } = {};

  on<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    const callbacks = this.listeners[event] ?? new Set<EventCallback<Events[K]>>();
    callbacks.add(callback);
    this.listeners[event] = callbacks;

    // Return unsubscribe function
    return () => {
      this.off(event, callback);
    };
  }

  off<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): void {
    this.listeners[event]?.delete(callback);
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const callbacks = this.listeners[event];
    if (!callbacks) return;

    for (const callback of [...callbacks]) {
      try {
        callback(data);
      } catch (error) {
        logger.error(`Handler for ${String(event)} threw`, error);
      }
    }
  }

  once<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    const wrapper = (data: Events[K]) => {
      this.off(event, wrapper);
      callback(data);
    };
    return this.on(event, wrapper);
  }

  removeAllListeners<K extends keyof Events>(event?: K): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }
}
