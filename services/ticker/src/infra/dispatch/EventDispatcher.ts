import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ConfigurationError } from '@/domain/errors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export type EventHandler<A extends unknown[]> = (...args: A) => void;

/**
 * キューが満杯のときの破棄方針（破棄対象になるのは droppable に指定した種別だけ）
 * - dropOldest: キュー内で最も古い破棄可能イベントを捨てる
 * - dropNewest: 新しく届いたイベントを捨てる
 */
export type BackpressurePolicy = 'dropOldest' | 'dropNewest';

export interface EventDispatcherOptions<M> {
  queueCapacity?: number;
  /** 1 回の setImmediate で配信する最大件数 */
  drainBatchSize?: number;
  backpressure?: BackpressurePolicy;
  /** 満杯時に破棄してよいイベント種別 */
  droppable?: ReadonlyArray<keyof M>;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

export const DEFAULT_QUEUE_CAPACITY = 1000;
export const DEFAULT_DRAIN_BATCH_SIZE = 100;

interface QueuedEvent {
  kind: string;
  droppable: boolean;
  deliver: () => void;
}

type HandlerTable<M extends Record<keyof M, unknown[]>> = {
  [K in keyof M]?: Array<EventHandler<M[K]>>;
};

/**
 * インフラ層: 型付きイベントの配信キュー
 *
 * 受信ループから emit されたイベントを FIFO に積み、setImmediate のターンごとに
 * drainBatchSize 件ずつ登録順のハンドラへ配信する。ハンドラの例外はログに出して次のハンドラへ進む。
 */
export class EventDispatcher<M extends Record<keyof M, unknown[]>> {
  private readonly handlers: HandlerTable<M> = {};
  private queue: QueuedEvent[] = [];
  private drainHandle: NodeJS.Immediate | null = null;
  private sealed = false;
  private droppedTotal = 0;
  private droppedSinceDrain = 0;

  private readonly capacity: number;
  private readonly batchSize: number;
  private readonly policy: BackpressurePolicy;
  private readonly droppable: ReadonlySet<keyof M>;
  private readonly logger: Logger;

  constructor(private readonly options: EventDispatcherOptions<M> = {}) {
    this.capacity = options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
    this.batchSize = options.drainBatchSize ?? DEFAULT_DRAIN_BATCH_SIZE;
    this.policy = options.backpressure ?? 'dropOldest';
    this.droppable = new Set(options.droppable ?? []);
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'EventDispatcher' });

    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new ConfigurationError(`queueCapacity must be a positive integer (got ${this.capacity})`);
    }
    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new ConfigurationError(`drainBatchSize must be a positive integer (got ${this.batchSize})`);
    }
  }

  /**
   * ハンドラを登録する
   * @returns 登録を解除する関数
   */
  on<K extends keyof M>(kind: K, handler: EventHandler<M[K]>): () => void {
    const list = this.handlers[kind];
    if (list) {
      list.push(handler);
    } else {
      this.handlers[kind] = [handler];
    }
    return () => this.off(kind, handler);
  }

  off<K extends keyof M>(kind: K, handler: EventHandler<M[K]>): void {
    const list = this.handlers[kind];
    if (!list) {
      return;
    }
    const index = list.indexOf(handler);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * イベントをキューに積む
   * @returns 配信対象になった場合 true（封印済み、または破棄された場合 false）
   */
  emit<K extends keyof M>(kind: K, ...args: M[K]): boolean {
    if (this.sealed) {
      return false;
    }

    const event: QueuedEvent = {
      kind: String(kind),
      droppable: this.droppable.has(kind),
      deliver: () => this.deliver(kind, args),
    };

    if (this.queue.length >= this.capacity && event.droppable && !this.makeRoom(event)) {
      return false;
    }

    // 制御イベントは容量を超えても積む
    this.queue.push(event);
    this.scheduleDrain();
    return true;
  }

  /**
   * キューを経由せずにその場で配信する（封印済みなら何もしない）
   */
  dispatchNow<K extends keyof M>(kind: K, ...args: M[K]): void {
    if (this.sealed) {
      return;
    }
    this.deliver(kind, args);
  }

  /**
   * 未配信のイベントをすべて破棄する
   */
  clear(): void {
    this.queue = [];
    if (this.drainHandle) {
      clearImmediate(this.drainHandle);
      this.drainHandle = null;
    }
  }

  /**
   * 以降の emit / dispatchNow を受け付けない
   */
  seal(): void {
    this.clear();
    this.sealed = true;
  }

  get pending(): number {
    return this.queue.length;
  }

  get dropped(): number {
    return this.droppedTotal;
  }

  listenerCount<K extends keyof M>(kind: K): number {
    return this.handlers[kind]?.length ?? 0;
  }

  /**
   * 満杯時に新しいイベントの場所を空ける
   * @returns 新しいイベントを積んでよい場合 true
   */
  private makeRoom(incoming: QueuedEvent): boolean {
    if (this.policy === 'dropOldest') {
      const index = this.queue.findIndex((queued) => queued.droppable);
      if (index !== -1) {
        const [oldest] = this.queue.splice(index, 1);
        this.recordDrop(oldest?.kind ?? incoming.kind);
        return true;
      }
    }
    this.recordDrop(incoming.kind);
    return false;
  }

  private recordDrop(kind: string): void {
    this.droppedTotal += 1;
    this.droppedSinceDrain += 1;
    this.options.metricsCollector?.incrementDropped(kind);
    // 同じ詰まりで何度も出さないよう、ドレインごとに最初の 1 件だけ警告する
    if (this.droppedSinceDrain === 1) {
      this.logger.warn('Event queue full, dropping events', {
        kind,
        policy: this.policy,
        capacity: this.capacity,
        droppedTotal: this.droppedTotal,
      });
    }
  }

  private scheduleDrain(): void {
    if (this.drainHandle) {
      return;
    }
    this.drainHandle = setImmediate(() => this.drain());
  }

  private drain(): void {
    this.drainHandle = null;
    this.droppedSinceDrain = 0;

    let delivered = 0;
    while (delivered < this.batchSize) {
      const event = this.queue.shift();
      if (!event) {
        break;
      }
      event.deliver();
      delivered += 1;
    }

    if (this.queue.length > 0) {
      this.scheduleDrain();
    }
  }

  private deliver<K extends keyof M>(kind: K, args: M[K]): void {
    const list = this.handlers[kind];
    if (!list || list.length === 0) {
      return;
    }
    // 配信中の on / off の影響を受けないようコピーしてから回す
    for (const handler of [...list]) {
      try {
        handler(...args);
      } catch (error) {
        this.logger.error('Event handler threw', { err: error, event: String(kind) });
      }
    }
  }
}
