import { ScannedSignal } from '../types';
import { log } from '../utils/logger';

export type SignalObserver = (symbol: string, timeframe: string, signal: ScannedSignal) => void | Promise<void>;

interface BusEvent {
  symbol: string;
  timeframe: string;
  signal: ScannedSignal;
}

/**
 * Bounded fan-out between the scanner and its observers. Publishing never
 * waits on an observer; when the queue is full the oldest event is dropped.
 */
export class SignalBus {
  private readonly capacity: number;
  private observers: Set<SignalObserver> = new Set();
  private queue: BusEvent[] = [];
  private draining: boolean = false;
  private idleWaiters: (() => void)[] = [];
  private droppedCount: number = 0;

  constructor(capacity: number = 1000) {
    this.capacity = Math.max(1, capacity);
  }

  /** Returns false when the observer was already subscribed. */
  subscribe(observer: SignalObserver): boolean {
    if (this.observers.has(observer)) return false;
    this.observers.add(observer);
    return true;
  }

  unsubscribe(observer: SignalObserver): boolean {
    return this.observers.delete(observer);
  }

  get observerCount(): number {
    return this.observers.size;
  }

  get pending(): number {
    return this.queue.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  publish(symbol: string, timeframe: string, signal: ScannedSignal): void {
    if (this.observers.size === 0) return;

    if (this.queue.length >= this.capacity) {
      const oldest = this.queue.shift();
      this.droppedCount += 1;
      log.warn(`Signal bus full (${this.capacity}), dropping oldest event`, {
        symbol: oldest?.symbol,
        timeframe: oldest?.timeframe,
      });
    }

    this.queue.push({ symbol, timeframe, signal });
    this.scheduleDrain();
  }

  /** Resolves once every queued event has been delivered. */
  flush(): Promise<void> {
    if (!this.draining && this.queue.length === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  close(): void {
    this.observers.clear();
    this.queue = [];
  }

  private scheduleDrain(): void {
    if (this.draining) return;
    this.draining = true;

    setImmediate(() => {
      this.drain().catch((error) => {
        log.error('Signal bus drain crashed', { error });
      });
    });
  }

  private async drain(): Promise<void> {
    try {
      let event = this.queue.shift();
      while (event) {
        await this.deliver(event);
        event = this.queue.shift();
      }
    } finally {
      this.draining = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach(resolve => resolve());
    }
  }

  private async deliver(event: BusEvent): Promise<void> {
    for (const observer of [...this.observers]) {
      try {
        // Each observer gets its own copy; the scheduler's cache keeps the original
        await observer(event.symbol, event.timeframe, structuredClone(event.signal));
      } catch (error) {
        log.error(`Signal observer failed for ${event.symbol} ${event.timeframe}`, { error });
      }
    }
  }
}
