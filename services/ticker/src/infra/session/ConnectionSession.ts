import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import {
  HeartbeatTimeoutError,
  ProtocolError,
  ServerMessageError,
  TickerError,
  TransportError,
  toTickerError,
} from '@/domain/errors';
import type {
  CloseReason,
  InstrumentToken,
  OrderUpdate,
  PartialPacketEvent,
  ServerNotice,
  SubscriptionMode,
  Tick,
} from '@/domain/types';
import type { FrameCodec } from '@/infra/codec/FrameCodec';
import type { ControlMessage } from '@/infra/codec/messages/ControlMessage';
import type { SubscriptionSource } from '@/infra/subscription/SubscriptionRegistry';
import { HeartbeatMonitor, type HeartbeatOptions } from '@/infra/websocket/HeartbeatMonitor';
import type {
  WebSocketConnection,
  WebSocketConnectionFactory,
} from '@/infra/websocket/interfaces/WebSocketConnection';

const NORMAL_CLOSURE = 1000;

/** ハンドシェイク時に送るプロトコルバージョン */
export const PROTOCOL_VERSION_HEADER = { 'X-Kite-Version': '3' } as const;

export interface SessionTermination {
  reason: CloseReason;
  /** ソケットが閉じた場合のクローズコード */
  code?: number;
  /** clean 以外の終了で原因となったエラー */
  error?: TickerError;
}

/**
 * セッションからの通知先。TickerClient が実装する。
 * onTerminated 以外はセッションが connected の間だけ呼ばれる。
 */
export interface SessionListener {
  onConnect(): void;
  onTicks(ticks: Tick[]): void;
  onPartial(event: PartialPacketEvent): void;
  onOrderUpdate(update: OrderUpdate): void;
  onMessage(notice: ServerNotice): void;
  /** セッションを終わらせないエラー（不正フレーム、サーバーの error メッセージ） */
  onError(error: TickerError): void;
  /** 終了時に必ず 1 度だけ呼ばれる */
  onTerminated(termination: SessionTermination): void;
}

export interface ConnectionSessionOptions {
  url: string;
  apiKey: string;
  accessToken: string;
  connectTimeoutMs: number;
  heartbeat: HeartbeatOptions;
  connectionFactory: WebSocketConnectionFactory;
  codec: FrameCodec;
  subscriptions: SubscriptionSource;
  logger: Logger;
  metricsCollector?: MetricsCollector;
}

type SessionState = 'idle' | 'connecting' | 'connected' | 'terminated';

/**
 * インフラ層: 1 本の WebSocket 接続のライフサイクル
 *
 * connecting → connected → terminated と一方向にだけ進む。再接続のたびに新しいインスタンスを作る。
 * 責務:
 * - ハンドシェイク（認証パラメータとバージョンヘッダー）とタイムアウト
 * - 接続直後の購読リプレイ
 * - 受信フレームのデコードとリスナーへの通知
 * - ハートビートによる生存監視
 * - 終了理由の判定（clean / error / timeout）
 */
export class ConnectionSession {
  private state: SessionState = 'idle';
  private connection: WebSocketConnection | null = null;
  private connectTimer: NodeJS.Timeout | null = null;
  private readonly heartbeat: HeartbeatMonitor;
  private readonly logger: Logger;
  private opened: Promise<void> | null = null;
  private settleOpen: ((error?: TickerError) => void) | null = null;

  constructor(
    private readonly options: ConnectionSessionOptions,
    private readonly listener: SessionListener
  ) {
    this.logger = options.logger.child({ component: 'ConnectionSession' });
    this.heartbeat = new HeartbeatMonitor(options.heartbeat, {
      ping: () => this.connection?.ping(),
      onTimeout: (silentForMs) => this.terminate('timeout', undefined, new HeartbeatTimeoutError(silentForMs)),
    });
  }

  /**
   * 接続を開始する。2 回目以降の呼び出しは同じ Promise を返す。
   * @returns connected になった時点で resolve、その前に終了した場合は終了原因で reject
   */
  open(): Promise<void> {
    if (this.opened) {
      return this.opened;
    }

    this.opened = new Promise<void>((resolve, reject) => {
      this.settleOpen = (error) => (error ? reject(error) : resolve());
    });

    this.state = 'connecting';
    this.logger.info('Connecting', { url: this.options.url });

    this.connectTimer = setTimeout(() => {
      this.terminate(
        'timeout',
        undefined,
        new TransportError(`Handshake did not complete within ${this.options.connectTimeoutMs}ms`)
      );
    }, this.options.connectTimeoutMs);

    try {
      const connection = this.options.connectionFactory({
        url: this.buildHandshakeUrl(),
        headers: { ...PROTOCOL_VERSION_HEADER },
      });
      this.connection = connection;
      connection.onOpen(() => this.handleOpen());
      connection.onMessage((data, isBinary) => this.handleMessage(data, isBinary));
      connection.onPong(() => this.heartbeat.touch());
      connection.onClose((code) => this.handleClose(code));
      connection.onError((error) => this.terminate('error', undefined, toTickerError(error)));
    } catch (error) {
      // 不正な URL などで接続の生成自体に失敗した場合
      this.terminate('error', undefined, toTickerError(error));
    }

    return this.opened;
  }

  /**
   * 呼び出し側からの切断。クローズフレーム（1000）を送り、再接続の対象にしない。
   */
  close(): void {
    if (this.state === 'terminated') {
      return;
    }
    // ハンドシェイク中ならクローズフレームを送れないので強制終了する
    if (this.connection?.isOpen) {
      this.connection.close(NORMAL_CLOSURE, 'client closed');
    } else {
      this.connection?.terminate();
    }
    this.terminate('clean', NORMAL_CLOSURE);
  }

  sendSubscribe(tokens: readonly InstrumentToken[]): boolean {
    return this.send(this.options.codec.encodeSubscribe(tokens));
  }

  sendUnsubscribe(tokens: readonly InstrumentToken[]): boolean {
    return this.send(this.options.codec.encodeUnsubscribe(tokens));
  }

  sendMode(mode: SubscriptionMode, tokens: readonly InstrumentToken[]): boolean {
    return this.send(this.options.codec.encodeSetMode(mode, tokens));
  }

  get isConnected(): boolean {
    return this.state === 'connected';
  }

  get isTerminated(): boolean {
    return this.state === 'terminated';
  }

  private handleOpen(): void {
    if (this.state !== 'connecting') {
      return;
    }
    this.state = 'connected';
    this.clearConnectTimer();
    this.heartbeat.start();
    this.logger.info('Connected');

    this.settleOpen?.();
    this.listener.onConnect();
    this.replaySubscriptions();
  }

  /**
   * レジストリの内容を送り直す。全トークンの subscribe を 1 通、続けてモードごとに mode を 1 通。
   */
  private replaySubscriptions(): void {
    const groups = this.options.subscriptions.groupByMode();
    const tokens = [...groups.values()].flat();
    if (tokens.length === 0) {
      return;
    }

    this.sendSubscribe(tokens);
    for (const [mode, group] of groups) {
      this.sendMode(mode, group);
    }
    this.logger.info('Subscriptions replayed', { tokens: tokens.length, modes: groups.size });
  }

  private handleMessage(data: Buffer, isBinary: boolean): void {
    this.heartbeat.touch();
    if (this.state !== 'connected') {
      return;
    }

    if (isBinary) {
      this.handleBinary(data);
    } else {
      this.handleText(data.toString('utf8'));
    }
  }

  private handleBinary(frame: Buffer): void {
    const ticks: Tick[] = [];
    const partials: PartialPacketEvent[] = [];
    try {
      const result = this.options.codec.decodeBinary(frame);
      if (result.kind === 'heartbeat') {
        return;
      }
      for (const packet of result.packets) {
        ticks.push(packet.tick);
        if (packet.status === 'partial') {
          partials.push({ instrumentToken: packet.tick.instrumentToken, packetLength: packet.packetLength });
        }
      }
    } catch (error) {
      this.reportProtocolError(error, frame.length);
      return;
    }

    if (ticks.length > 0) {
      this.recordTicks(ticks);
      this.listener.onTicks(ticks);
    }
    for (const partial of partials) {
      this.options.metricsCollector?.incrementPartialPackets();
      this.listener.onPartial(partial);
    }
  }

  private handleText(text: string): void {
    let message: ControlMessage;
    try {
      message = this.options.codec.decodeText(text);
    } catch (error) {
      this.reportProtocolError(error, text.length);
      return;
    }

    switch (message.type) {
      case 'order':
        this.listener.onOrderUpdate(message.data);
        break;
      case 'error':
        this.logger.warn('Server reported an error', { message: message.message });
        this.listener.onError(new ServerMessageError(message.message));
        break;
      case 'ack':
        this.listener.onMessage({ type: message.messageType, data: message.data });
        break;
    }
  }

  private reportProtocolError(error: unknown, frameLength: number): void {
    const protocolError =
      error instanceof TickerError ? error : new ProtocolError('Failed to decode frame', { cause: error });
    this.logger.warn('Dropped malformed frame', { err: protocolError, frameLength });
    this.options.metricsCollector?.incrementError(protocolError.code);
    this.listener.onError(protocolError);
  }

  private handleClose(code: number): void {
    if (code === NORMAL_CLOSURE && this.state === 'connected') {
      this.terminate('clean', code);
      return;
    }
    this.terminate('error', code, new TransportError(`Connection closed with code ${code}`));
  }

  /**
   * 送信はセッションが connected のときだけ行う。書き込みに失敗したらセッションを終了する。
   */
  private send(text: string): boolean {
    if (this.state !== 'connected' || !this.connection?.isOpen) {
      return false;
    }
    try {
      this.connection.send(text);
      return true;
    } catch (error) {
      this.terminate('error', undefined, toTickerError(error));
      return false;
    }
  }

  /**
   * セッションを終了する。何度呼ばれても通知は最初の 1 回だけ。
   */
  private terminate(reason: CloseReason, code?: number, error?: TickerError): void {
    if (this.state === 'terminated') {
      return;
    }
    const wasConnected = this.state === 'connected';
    this.state = 'terminated';

    this.clearConnectTimer();
    this.heartbeat.stop();
    if (this.connection) {
      this.connection.removeAllListeners();
      if (reason !== 'clean') {
        this.connection.terminate();
      }
    }

    if (error) {
      this.options.metricsCollector?.incrementError(error.code);
      this.logger.warn('Session terminated', { reason, code, err: error, wasConnected });
    } else {
      this.logger.info('Session terminated', { reason, code, wasConnected });
    }

    if (!wasConnected) {
      this.settleOpen?.(error ?? new TransportError('Session closed before the handshake completed'));
    }
    this.settleOpen = null;

    this.listener.onTerminated({ reason, code, error });
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private buildHandshakeUrl(): string {
    const url = new URL(this.options.url);
    url.searchParams.set('api_key', this.options.apiKey);
    url.searchParams.set('access_token', this.options.accessToken);
    return url.toString();
  }

  private recordTicks(ticks: Tick[]): void {
    const metrics = this.options.metricsCollector;
    if (!metrics) {
      return;
    }
    const counts = new Map<SubscriptionMode, number>();
    for (const tick of ticks) {
      counts.set(tick.mode, (counts.get(tick.mode) ?? 0) + 1);
    }
    for (const [mode, count] of counts) {
      metrics.incrementTicks(mode, count);
    }
  }
}
