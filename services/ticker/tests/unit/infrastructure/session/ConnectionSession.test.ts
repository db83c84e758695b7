import { frameOf, ltpPacket } from '@test/unit/helpers/fixtures/TickPacketBuilder';
import { createFakeConnectionFactory } from '@test/unit/helpers/mocks/FakeWebSocketConnection';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AuthenticationError,
  HeartbeatTimeoutError,
  ProtocolError,
  ServerMessageError,
  type TickerError,
  TransportError,
} from '@/domain/errors';
import type { OrderUpdate, PartialPacketEvent, ServerNotice, Tick } from '@/domain/types';
import { FrameCodec } from '@/infra/codec/FrameCodec';
import { ConnectionSession, type SessionListener, type SessionTermination } from '@/infra/session/ConnectionSession';
import { SubscriptionRegistry } from '@/infra/subscription/SubscriptionRegistry';

function createListener() {
  return {
    onConnect: vi.fn<() => void>(),
    onTicks: vi.fn<(ticks: Tick[]) => void>(),
    onPartial: vi.fn<(event: PartialPacketEvent) => void>(),
    onOrderUpdate: vi.fn<(update: OrderUpdate) => void>(),
    onMessage: vi.fn<(notice: ServerNotice) => void>(),
    onError: vi.fn<(error: TickerError) => void>(),
    onTerminated: vi.fn<(termination: SessionTermination) => void>(),
  } satisfies SessionListener;
}

/**
 * 単体テスト: ConnectionSession
 *
 * - ハンドシェイク（URL・ヘッダー・タイムアウト）
 * - 接続直後の購読リプレイ
 * - バイナリ / テキストフレームの通知
 * - 終了理由の判定と、終了通知がちょうど 1 回であること
 * - ハートビートによる途絶検知
 */
describe('ConnectionSession', () => {
  let loggerMock: LoggerMock;
  let metricsCollector: MetricsCollectorMock;
  let registry: SubscriptionRegistry;
  let fake: ReturnType<typeof createFakeConnectionFactory>;
  let listener: ReturnType<typeof createListener>;

  function createSession(): ConnectionSession {
    return new ConnectionSession(
      {
        url: 'wss://ticker.test',
        apiKey: 'test-key',
        accessToken: 'test-secret',
        connectTimeoutMs: 30_000,
        heartbeat: { intervalMs: 2500, timeoutMultiplier: 2 },
        connectionFactory: fake.factory,
        codec: new FrameCodec(),
        subscriptions: registry,
        logger: loggerMock,
        metricsCollector,
      },
      listener
    );
  }

  /** 接続済みのセッションを作る */
  async function openSession(): Promise<ConnectionSession> {
    const session = createSession();
    const opened = session.open();
    fake.latest().simulateOpen();
    await opened;
    return session;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    loggerMock = new LoggerMock();
    metricsCollector = new MetricsCollectorMock();
    registry = new SubscriptionRegistry();
    fake = createFakeConnectionFactory();
    listener = createListener();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('ハンドシェイク', () => {
    it('認証パラメータをクエリに付け、バージョンヘッダーを送る', () => {
      const session = createSession();
      void session.open();

      expect(fake.latest().request).toEqual({
        url: 'wss://ticker.test/?api_key=test-key&access_token=test-secret',
        headers: { 'X-Kite-Version': '3' },
      });
    });

    it('open() は接続完了で resolve し、onConnect を呼ぶ', async () => {
      const session = await openSession();

      expect(session.isConnected).toBe(true);
      expect(listener.onConnect).toHaveBeenCalledTimes(1);
    });

    it('open() を再度呼んでも同じ接続を使う', async () => {
      const session = createSession();
      const first = session.open();
      const second = session.open();

      expect(second).toBe(first);
      expect(fake.connections).toHaveLength(1);
      session.close();
      await expect(first).rejects.toBeInstanceOf(TransportError);
    });

    it('connectTimeoutMs 以内に開かなければ timeout で終了し、open() は reject する', async () => {
      const session = createSession();
      const opened = session.open();

      vi.advanceTimersByTime(30_000);

      await expect(opened).rejects.toThrow('Handshake did not complete within 30000ms');
      expect(listener.onTerminated).toHaveBeenCalledWith({
        reason: 'timeout',
        code: undefined,
        error: expect.any(TransportError),
      });
      expect(fake.latest().terminated).toBe(true);
      expect(session.isTerminated).toBe(true);
    });

    it('ハンドシェイク中のエラーは error で終了する', async () => {
      const session = createSession();
      const opened = session.open();

      fake.latest().simulateError(new AuthenticationError(403));

      await expect(opened).rejects.toBeInstanceOf(AuthenticationError);
      expect(listener.onTerminated.mock.calls[0]?.[0].reason).toBe('error');
      expect(metricsCollector.incrementError).toHaveBeenCalledWith('AUTHENTICATION_FAILED');
    });

    it('接続の生成に失敗した場合も error で終了する', async () => {
      const session = new ConnectionSession(
        {
          url: 'wss://ticker.test',
          apiKey: 'test-key',
          accessToken: 'test-secret',
          connectTimeoutMs: 30_000,
          heartbeat: { intervalMs: 2500, timeoutMultiplier: 2 },
          connectionFactory: () => {
            throw new Error('socket refused');
          },
          codec: new FrameCodec(),
          subscriptions: registry,
          logger: loggerMock,
        },
        listener
      );

      await expect(session.open()).rejects.toThrow('socket refused');
      expect(listener.onTerminated).toHaveBeenCalledTimes(1);
    });
  });

  describe('購読のリプレイ', () => {
    it('全トークンの subscribe を 1 通、続けてモードごとに mode を送る', async () => {
      registry.setMode('full', [100]);
      registry.subscribe([200]);

      await openSession();

      expect(fake.latest().sentCommands()).toEqual([
        { a: 'subscribe', v: [100, 200] },
        { a: 'mode', v: ['full', [100]] },
        { a: 'mode', v: ['quote', [200]] },
      ]);
    });

    it('購読がなければ何も送らない', async () => {
      await openSession();

      expect(fake.latest().sent).toEqual([]);
    });
  });

  describe('バイナリフレーム', () => {
    it('ティックをデコードして通知し、モード別に計測する', async () => {
      await openSession();

      fake.latest().simulateBinary(frameOf(ltpPacket(12345, 1505000)));

      expect(listener.onTicks).toHaveBeenCalledWith([
        { kind: 'ltp', mode: 'ltp', instrumentToken: 12345, tradable: true, lastPrice: 15050 },
      ]);
      expect(metricsCollector.incrementTicks).toHaveBeenCalledWith('ltp', 1);
    });

    it('未知の長さのパケットは部分的なティックと partial イベントを出す', async () => {
      await openSession();
      const packet = Buffer.alloc(12);
      packet.writeUInt32BE(12345, 0);
      packet.writeUInt32BE(1505000, 4);

      fake.latest().simulateBinary(frameOf(packet));

      expect(listener.onTicks.mock.calls[0]?.[0]).toEqual([expect.objectContaining({ lastPrice: 15050 })]);
      expect(listener.onPartial).toHaveBeenCalledWith({ instrumentToken: 12345, packetLength: 12 });
      expect(metricsCollector.incrementPartialPackets).toHaveBeenCalledTimes(1);
    });

    it('1 バイトのハートビートは何も通知しない', async () => {
      await openSession();

      fake.latest().simulateBinary(Buffer.from([0x00]));

      expect(listener.onTicks).not.toHaveBeenCalled();
      expect(listener.onError).not.toHaveBeenCalled();
    });

    it('壊れたフレームは ProtocolError を通知し、接続は維持する', async () => {
      const session = await openSession();
      const truncated = frameOf(ltpPacket(12345, 1505000)).subarray(0, 6);

      fake.latest().simulateBinary(truncated);
      fake.latest().simulateBinary(frameOf(ltpPacket(12345, 1505000)));

      expect(listener.onError).toHaveBeenCalledWith(expect.any(ProtocolError));
      expect(metricsCollector.incrementError).toHaveBeenCalledWith('PROTOCOL_ERROR');
      expect(listener.onTicks).toHaveBeenCalledTimes(1);
      expect(session.isConnected).toBe(true);
    });
  });

  describe('テキストフレーム', () => {
    it('order は注文更新として通知する', async () => {
      await openSession();

      fake.latest().simulateText('{"type":"order","data":{"order_id":"order-1","status":"COMPLETE"}}');

      expect(listener.onOrderUpdate).toHaveBeenCalledWith({ order_id: 'order-1', status: 'COMPLETE' });
    });

    it('error は ServerMessageError として通知し、接続は維持する', async () => {
      const session = await openSession();

      fake.latest().simulateText('{"type":"error","data":"Invalid token"}');

      const error = listener.onError.mock.calls[0]?.[0];
      expect(error).toBeInstanceOf(ServerMessageError);
      expect(error?.message).toBe('Invalid token');
      expect(session.isConnected).toBe(true);
    });

    it('その他の種別は message として通知する', async () => {
      await openSession();

      fake.latest().simulateText('{"type":"instruments_meta","data":{"count":2}}');

      expect(listener.onMessage).toHaveBeenCalledWith({ type: 'instruments_meta', data: { count: 2 } });
    });

    it('JSON でなければ ProtocolError を通知する', async () => {
      await openSession();

      fake.latest().simulateText('not json');

      expect(listener.onError).toHaveBeenCalledWith(expect.any(ProtocolError));
    });
  });

  describe('終了', () => {
    it('接続中に 1000 で閉じられたら clean', async () => {
      await openSession();

      fake.latest().simulateClose(1000);

      expect(listener.onTerminated).toHaveBeenCalledWith({ reason: 'clean', code: 1000, error: undefined });
    });

    it('1000 以外で閉じられたら error', async () => {
      await openSession();

      fake.latest().simulateClose(1006);

      const termination = listener.onTerminated.mock.calls[0]?.[0];
      expect(termination?.reason).toBe('error');
      expect(termination?.code).toBe(1006);
      expect(termination?.error?.message).toBe('Connection closed with code 1006');
    });

    it('ハンドシェイク前の 1000 は error とし、open() は reject する', async () => {
      const session = createSession();
      const opened = session.open();

      fake.latest().simulateClose(1000);

      await expect(opened).rejects.toBeInstanceOf(TransportError);
      expect(listener.onTerminated.mock.calls[0]?.[0].reason).toBe('error');
    });

    it('close() はクローズフレームを送り clean で終了する', async () => {
      const session = await openSession();
      const connection = fake.latest();

      session.close();

      expect(connection.closedWith).toEqual({ code: 1000, reason: 'client closed' });
      expect(connection.terminated).toBe(false);
      expect(listener.onTerminated).toHaveBeenCalledWith({ reason: 'clean', code: 1000, error: undefined });
    });

    it('ハンドシェイク中の close() はソケットを強制終了する', async () => {
      const session = createSession();
      const opened = session.open();

      session.close();

      await expect(opened).rejects.toBeInstanceOf(TransportError);
      expect(fake.latest().terminated).toBe(true);
    });

    it('終了の通知は 1 度だけ', async () => {
      const session = await openSession();
      const connection = fake.latest();

      connection.simulateError(new Error('ECONNRESET'));
      connection.simulateClose(1006);
      session.close();

      expect(listener.onTerminated).toHaveBeenCalledTimes(1);
      expect(listener.onTerminated.mock.calls[0]?.[0]).toEqual({
        reason: 'error',
        code: undefined,
        error: expect.any(TransportError),
      });
    });

    it('終了後は送信しない', async () => {
      const session = await openSession();

      session.close();

      expect(session.sendSubscribe([100])).toBe(false);
      expect(fake.latest().sent).toEqual([]);
    });
  });

  describe('ハートビート', () => {
    it('間隔ごとに ping を送り、途絶したら timeout で終了する', async () => {
      await openSession();
      const connection = fake.latest();

      vi.advanceTimersByTime(2500);
      expect(connection.pings).toBe(1);

      vi.advanceTimersByTime(2500);
      expect(listener.onTerminated).toHaveBeenCalledWith({
        reason: 'timeout',
        code: undefined,
        error: expect.any(HeartbeatTimeoutError),
      });
      expect(connection.terminated).toBe(true);
    });

    it('pong を受け取っていれば途絶とみなさない', async () => {
      await openSession();
      const connection = fake.latest();

      for (let i = 0; i < 5; i++) {
        vi.advanceTimersByTime(2000);
        connection.simulatePong();
      }

      expect(listener.onTerminated).not.toHaveBeenCalled();
    });
  });

  it('接続前の送信は false を返す', () => {
    const session = createSession();
    void session.open().catch(() => undefined);

    expect(session.sendMode('ltp', [100])).toBe(false);
    expect(fake.latest().sent).toEqual([]);
  });
});
