import type { BattleEvent, BattleEventType } from '../types';
import type { Logger } from './Logger';

type Listener = (event: BattleEvent) => void;

export interface EventBus {
  subscribe<K extends BattleEventType>(type: K, callback: (event: BattleEvent<K>) => void): () => void;
  subscribeAll(callback: (event: BattleEvent) => void): () => void;
  emit<K extends BattleEventType>(event: BattleEvent<K>): void;
  getHistory(): BattleEvent[];
  clearHistory(): void;
}

function isEventOf<K extends BattleEventType>(event: BattleEvent, type: K): event is BattleEvent<K> {
  return event.type === type;
}

export class EventBusImpl implements EventBus {
  private listeners: Map<BattleEventType, Set<Listener>> = new Map();
  private allListeners: Set<Listener> = new Set();
  private history: BattleEvent[] = [];

  constructor(private readonly logger?: Logger) {}

  subscribe<K extends BattleEventType>(type: K, callback: (event: BattleEvent<K>) => void): () => void {
    const listener: Listener = (event) => {
      if (isEventOf(event, type)) {
        callback(event);
      }
    };

    let typeListeners = this.listeners.get(type);
    if (!typeListeners) {
      typeListeners = new Set();
      this.listeners.set(type, typeListeners);
    }
    typeListeners.add(listener);

    return () => {
      this.listeners.get(type)?.delete(listener);
    };
  }

  subscribeAll(callback: (event: BattleEvent) => void): () => void {
    this.allListeners.add(callback);
    return () => {
      this.allListeners.delete(callback);
    };
  }

  emit<K extends BattleEventType>(event: BattleEvent<K>): void {
    this.history.push(event);

    // Snapshot the sets so a listener may unsubscribe while being notified
    const typeListeners = this.listeners.get(event.type);
    if (typeListeners) {
      for (const callback of [...typeListeners]) {
        this.deliver(callback, event);
      }
    }

    for (const callback of [...this.allListeners]) {
      this.deliver(callback, event);
    }
  }

  getHistory(): BattleEvent[] {
    return [...this.history];
  }

  /** Events of one type, in emission order. */
  getHistoryOf<K extends BattleEventType>(type: K): BattleEvent<K>[] {
    const result: BattleEvent<K>[] = [];
    for (const event of this.history) {
      if (isEventOf(event, type)) {
        result.push(event);
      }
    }
    return result;
  }

  clearHistory(): void {
    this.history = [];
  }

  private deliver(callback: Listener, event: BattleEvent): void {
    try {
      callback(event);
    } catch (error) {
      // A failing observer must not stop the battle or the other observers
      this.logger?.error(`listener for ${event.type} threw`, error);
    }
  }
}
