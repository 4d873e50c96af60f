import { ShutdownProtocolViolation } from "./errors";

export type QueueItem<T> = { kind: "task"; task: T } | { kind: "done" };

/**
 * RUNNING -> DRAINING (done markers enqueued) -> CLOSED (consumers joined).
 * Any state but CLOSED can move to ABORTED when a stage crashes.
 */
export type QueueState = "RUNNING" | "DRAINING" | "CLOSED" | "ABORTED";

interface Waiter<T> {
  resolve: (item: QueueItem<T>) => void;
  reject: (error: unknown) => void;
}

interface BlockedPut {
  resolve: () => void;
  reject: (error: unknown) => void;
}

/**
 * FIFO handoff between two stages. `take()` waits while the queue is empty.
 * With a capacity, `put()` waits while the queue is full.
 */
export class StageQueue<T> {
  readonly name: string;
  private readonly capacity: number;
  private items: QueueItem<T>[] = [];
  private takers: Waiter<T>[] = [];
  private putters: BlockedPut[] = [];
  private _state: QueueState = "RUNNING";
  private failure: unknown = null;

  constructor(name: string, capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Queue ${name}: capacity must be a non-negative integer`);
    }
    this.name = name;
    this.capacity = capacity;
  }

  get state(): QueueState {
    return this._state;
  }

  get size(): number {
    return this.items.length;
  }

  get bounded(): boolean {
    return this.capacity > 0;
  }

  async put(task: T): Promise<void> {
    this.throwIfAborted();
    if (this._state !== "RUNNING") {
      throw new ShutdownProtocolViolation(
        `Queue ${this.name}: task enqueued after shutdown began (${this._state})`,
      );
    }
    await this.enqueue({ kind: "task", task });
  }

  /**
   * Enqueue one done marker per consumer. Only legal once every producer
   * feeding this queue has finished.
   */
  async signalDone(consumers: number): Promise<void> {
    this.throwIfAborted();
    if (this._state !== "RUNNING") {
      throw new ShutdownProtocolViolation(
        `Queue ${this.name}: done markers already sent`,
      );
    }
    this._state = "DRAINING";
    for (let i = 0; i < consumers; i++) {
      await this.enqueue({ kind: "done" });
    }
  }

  take(): Promise<QueueItem<T>> {
    if (this._state === "ABORTED") return Promise.reject(this.failure);
    const item = this.items.shift();
    if (item !== undefined) {
      this.putters.shift()?.resolve();
      return Promise.resolve(item);
    }
    return new Promise((resolve, reject) => {
      this.takers.push({ resolve, reject });
    });
  }

  /**
   * Fails every blocked and future put, take and signalDone with `error`.
   * Queued items are dropped. Only the first abort counts.
   */
  abort(error: unknown): void {
    if (this._state === "ABORTED" || this._state === "CLOSED") return;
    this._state = "ABORTED";
    this.failure = error;
    this.items = [];
    for (const taker of this.takers.splice(0)) taker.reject(error);
    for (const putter of this.putters.splice(0)) putter.reject(error);
  }

  /**
   * Called after the consuming pool has been joined. Anything still queued
   * means markers were miscounted.
   */
  close(): void {
    this.throwIfAborted();
    if (this._state !== "DRAINING") {
      throw new ShutdownProtocolViolation(
        `Queue ${this.name}: closed from state ${this._state}`,
      );
    }
    if (this.items.length > 0) {
      const leftoverTasks = this.items.filter((i) => i.kind === "task").length;
      throw new ShutdownProtocolViolation(
        `Queue ${this.name}: closed with ${leftoverTasks} task(s) and ` +
          `${this.items.length - leftoverTasks} done marker(s) unconsumed`,
      );
    }
    this._state = "CLOSED";
  }

  private throwIfAborted(): void {
    if (this._state === "ABORTED") throw this.failure;
  }

  private async enqueue(item: QueueItem<T>): Promise<void> {
    for (;;) {
      this.throwIfAborted();
      const taker = this.takers.shift();
      if (taker) {
        taker.resolve(item);
        return;
      }
      if (!this.bounded || this.items.length < this.capacity) {
        this.items.push(item);
        return;
      }
      await new Promise<void>((resolve, reject) => {
        this.putters.push({ resolve, reject });
      });
    }
  }
}
