import type { Logger } from '@/application/interfaces/Logger';
import { type ResolvedTickerOptions, resolveTickerOptions, type TickerOptions } from '@/config/TickerOptions';
import { IllegalStateError } from '@/domain/errors';
import type { TickerEventMap } from '@/domain/events';
import type { ConnectionState, InstrumentToken, SubscriptionMode } from '@/domain/types';
import { FrameCodec } from '@/infra/codec/FrameCodec';
import { type EventHandler, EventDispatcher } from '@/infra/dispatch/EventDispatcher';
import { ReconnectManager } from '@/infra/reconnect/ReconnectManager';
import { ConnectionSession, type SessionTermination } from '@/infra/session/ConnectionSession';
import { SubscriptionRegistry } from '@/infra/subscription/SubscriptionRegistry';

/**
 * プレゼンテーション層: ストリーミングクライアントの窓口
 *
 * 責務:
 * - 接続状態の管理（disconnected / connecting / connected / reconnecting / closed）
 * - 購読状態の記録と、接続中であれば制御メッセージの即時送信
 * - セッションの生成と、切断時の再接続の指示
 * - イベントの発行（配信は EventDispatcher に任せる）
 *
 * 使い方:
 * ```ts
 * const client = new TickerClient({ apiKey: 'my-key', accessToken: 'my-token' });
 * client.on('tick', (ticks) => console.log(ticks));
 * client.subscribe([408065]);
 * await client.connect();
 * ```
 */
export class TickerClient {
  private readonly options: ResolvedTickerOptions;
  private readonly logger: Logger;
  private readonly codec: FrameCodec;
  private readonly registry: SubscriptionRegistry;
  private readonly dispatcher: EventDispatcher<TickerEventMap>;
  private readonly reconnectManager: ReconnectManager;

  private currentState: ConnectionState = 'disconnected';
  private session: ConnectionSession | null = null;
  private inflight: Promise<void> | null = null;
  private stopped = false;
  private sessionCount = 0;

  /**
   * @throws {ConfigurationError} 設定値が不正な場合
   */
  constructor(options: TickerOptions) {
    this.options = resolveTickerOptions(options);
    const { logger, metricsCollector } = this.options;
    this.logger = logger.child({ component: 'TickerClient' });

    this.codec = new FrameCodec(this.options.priceDivisors);
    this.registry = new SubscriptionRegistry(this.options.defaultMode);
    this.dispatcher = new EventDispatcher<TickerEventMap>({
      queueCapacity: this.options.queueCapacity,
      drainBatchSize: this.options.drainBatchSize,
      backpressure: this.options.backpressure,
      droppable: ['tick'],
      logger,
      metricsCollector,
    });
    // バックオフ設定はここで検証される（不正なら ConfigurationError）
    this.reconnectManager = new ReconnectManager(() => this.openSession(), {
      backoff: this.options.reconnect,
      maxRetries: this.options.maxRetries,
      shouldRetry: () => this.options.autoReconnect && !this.stopped,
      onScheduled: (event) => {
        this.setState('reconnecting');
        this.dispatcher.emit('reconnect', event);
      },
      onExhausted: (error) => {
        // closed は終端状態なので、以降の操作も stop() 済みと同じく拒否する
        this.stopped = true;
        this.setState('closed');
        this.dispatcher.emit('error', error);
      },
      logger,
      metricsCollector,
    });
    metricsCollector?.setConnectionState(this.currentState);
  }

  /**
   * 接続を開始する。接続中・接続済みの場合は進行中の試行を返す。
   * 初回の試行が終わった時点で resolve する（失敗は error / close イベントで通知され、再接続が続く）。
   * @throws {IllegalStateError} stop() 済み、またはリトライ上限に達した後
   */
  connect(): Promise<void> {
    if (this.currentState === 'closed') {
      throw new IllegalStateError('Ticker client is closed; create a new instance to reconnect');
    }
    if (this.currentState !== 'disconnected') {
      return this.inflight ?? Promise.resolve();
    }

    this.setState('connecting');
    this.inflight = this.reconnectManager.start();
    return this.inflight;
  }

  /**
   * 接続を終了し、以降のイベントを止める。どの状態からでも closed になる。
   * 最後の close イベントはこの呼び出しの中で同期的に配信される。
   */
  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;

    const session = this.session;
    this.session = null;
    this.reconnectManager.stop();
    this.dispatcher.clear();
    session?.close();
    this.registry.clear();
    this.setState('closed');
    this.inflight = null;

    this.logger.info('Ticker client stopped');
    this.dispatcher.dispatchNow('close', { reason: 'clean' });
    this.dispatcher.seal();
  }

  /**
   * 既定モードで購読する。購読済みのトークンはモードを変えない。
   * @returns 新たに購読したトークン
   * @throws {ConfigurationError} 不正なトークンを含む場合（購読状態は変わらない）
   */
  subscribe(tokens: readonly InstrumentToken[]): InstrumentToken[] {
    this.assertUsable('subscribe');
    const added = this.registry.subscribe(tokens);
    if (added.length > 0 && this.session?.isConnected) {
      this.session.sendSubscribe(added);
      this.session.sendMode(this.options.defaultMode, added);
    }
    return added;
  }

  /**
   * @returns 実際に購読を解除したトークン
   */
  unsubscribe(tokens: readonly InstrumentToken[]): InstrumentToken[] {
    this.assertUsable('unsubscribe');
    const removed = this.registry.unsubscribe(tokens);
    if (removed.length > 0 && this.session?.isConnected) {
      this.session.sendUnsubscribe(removed);
    }
    return removed;
  }

  /**
   * モードを設定する。未購読のトークンは購読も行う。
   */
  setMode(mode: SubscriptionMode, tokens: readonly InstrumentToken[]): void {
    this.assertUsable('setMode');
    const updated = this.registry.setMode(mode, tokens);
    if (updated.length > 0 && this.session?.isConnected) {
      this.session.sendSubscribe(updated);
      this.session.sendMode(mode, updated);
    }
  }

  on<K extends keyof TickerEventMap>(kind: K, handler: EventHandler<TickerEventMap[K]>): () => void {
    return this.dispatcher.on(kind, handler);
  }

  off<K extends keyof TickerEventMap>(kind: K, handler: EventHandler<TickerEventMap[K]>): void {
    this.dispatcher.off(kind, handler);
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  isConnected(): boolean {
    return this.currentState === 'connected';
  }

  subscriptions(): ReadonlyMap<InstrumentToken, SubscriptionMode> {
    return this.registry.snapshot();
  }

  /**
   * 新しいセッションを開く（ReconnectManager の接続関数）
   */
  private openSession(): Promise<void> {
    if (this.stopped) {
      return Promise.resolve();
    }

    this.sessionCount += 1;
    const sessionId = this.sessionCount;
    const session: ConnectionSession = new ConnectionSession(
      {
        url: this.options.url,
        apiKey: this.options.apiKey,
        accessToken: this.options.accessToken,
        connectTimeoutMs: this.options.connectTimeoutMs,
        heartbeat: {
          intervalMs: this.options.heartbeatIntervalMs,
          timeoutMultiplier: this.options.heartbeatTimeoutMultiplier,
        },
        connectionFactory: this.options.connectionFactory,
        codec: this.codec,
        subscriptions: this.registry,
        logger: this.options.logger.child({ session: sessionId }),
        metricsCollector: this.options.metricsCollector,
      },
      {
        // 置き換えられた古いセッションからの通知は捨てる
        onConnect: () => this.isCurrent(session) && this.handleConnect(),
        onTicks: (ticks) => this.isCurrent(session) && this.dispatcher.emit('tick', ticks),
        onPartial: (event) => this.isCurrent(session) && this.dispatcher.emit('partial', event),
        onOrderUpdate: (update) => this.isCurrent(session) && this.dispatcher.emit('orderUpdate', update),
        onMessage: (notice) => this.isCurrent(session) && this.dispatcher.emit('message', notice),
        onError: (error) => this.isCurrent(session) && this.dispatcher.emit('error', error),
        onTerminated: (termination) => this.isCurrent(session) && this.handleTerminated(termination),
      }
    );
    this.session = session;
    return session.open();
  }

  private isCurrent(session: ConnectionSession): boolean {
    return this.session === session && !this.stopped;
  }

  private handleConnect(): void {
    this.reconnectManager.markConnected();
    this.setState('connected');
    this.dispatcher.emit('connect');
  }

  private handleTerminated({ reason, code, error }: SessionTermination): void {
    this.session = null;
    if (error) {
      this.dispatcher.emit('error', error);
    }
    this.dispatcher.emit('close', { reason, code });

    if (reason === 'clean' || !this.options.autoReconnect) {
      this.setState('disconnected');
      this.inflight = null;
      return;
    }
    this.reconnectManager.scheduleReconnect();
  }

  private setState(next: ConnectionState): void {
    if (this.currentState === next) {
      return;
    }
    this.logger.debug('State changed', { from: this.currentState, to: next });
    this.currentState = next;
    this.options.metricsCollector?.setConnectionState(next);
  }

  private assertUsable(operation: string): void {
    if (this.stopped) {
      throw new IllegalStateError(`Cannot ${operation} after stop()`);
    }
  }
}
