import { afterEach, describe, expect, it, type Mock, vi } from 'vitest';
import { AuthenticationError, TransportError } from '@/domain/errors';
import { WsWebSocketConnection } from '@/infra/websocket/WsWebSocketConnection';

interface MockSocket {
  url: string;
  options: unknown;
  readyState: number;
  send: Mock<(data: string, cb?: (error?: Error) => void) => void>;
  ping: Mock<() => void>;
  close: Mock<(code?: number, reason?: string) => void>;
  terminate: Mock<() => void>;
  emit(event: string, ...args: unknown[]): boolean;
}

const sockets = vi.hoisted((): MockSocket[] => []);

// ws をモック（EventEmitter でイベントを起こせるようにする）
vi.mock('ws', async () => {
  const { EventEmitter } = await import('node:events');

  class MockWebSocket extends EventEmitter {
    static readonly OPEN = 1;
    readyState = 0;
    send = vi.fn<(data: string, cb?: (error?: Error) => void) => void>();
    ping = vi.fn<() => void>();
    close = vi.fn<(code?: number, reason?: string) => void>();
    terminate = vi.fn<() => void>();

    constructor(
      readonly url: string,
      readonly options: unknown
    ) {
      super();
      sockets.push(this);
    }
  }

  return { default: MockWebSocket };
});

function connect(): { connection: WsWebSocketConnection; socket: MockSocket } {
  const connection = WsWebSocketConnection.connect({
    url: 'wss://ticker.test/?api_key=test-key&access_token=test-secret',
    headers: { 'X-Kite-Version': '3' },
  });
  const socket = sockets.at(-1);
  if (!socket) {
    throw new Error('socket was not created');
  }
  return { connection, socket };
}

/**
 * 単体テスト: WsWebSocketConnection
 *
 * - 接続要求（URL とヘッダー）の受け渡し
 * - ws のイベントからコールバックへの変換
 * - ハンドシェイクの拒否（unexpected-response）
 * - 送信エラーの通知
 */
describe('WsWebSocketConnection', () => {
  afterEach(() => {
    sockets.length = 0;
  });

  it('URL とヘッダーを ws に渡す', () => {
    const { socket } = connect();

    expect(socket.url).toBe('wss://ticker.test/?api_key=test-key&access_token=test-secret');
    expect(socket.options).toEqual({ headers: { 'X-Kite-Version': '3' } });
  });

  describe('受信', () => {
    it('Buffer はそのまま isBinary と一緒に渡す', () => {
      const { connection, socket } = connect();
      const onMessage = vi.fn();
      connection.onMessage(onMessage);

      const frame = Buffer.from([0x00, 0x01]);
      socket.emit('message', frame, true);

      expect(onMessage).toHaveBeenCalledWith(frame, true);
    });

    it('分割されたフレームは連結して渡す', () => {
      const { connection, socket } = connect();
      const onMessage = vi.fn<(data: Buffer, isBinary: boolean) => void>();
      connection.onMessage(onMessage);

      socket.emit('message', [Buffer.from([0x01]), Buffer.from([0x02, 0x03])], true);

      expect(onMessage.mock.calls[0]?.[0]).toEqual(Buffer.from([0x01, 0x02, 0x03]));
    });

    it('ArrayBuffer は Buffer に変換する', () => {
      const { connection, socket } = connect();
      const onMessage = vi.fn<(data: Buffer, isBinary: boolean) => void>();
      connection.onMessage(onMessage);

      socket.emit('message', new Uint8Array([0x0a, 0x0b]).buffer, false);

      expect(onMessage.mock.calls[0]?.[0]).toEqual(Buffer.from([0x0a, 0x0b]));
      expect(onMessage.mock.calls[0]?.[1]).toBe(false);
    });

    it('close の理由は文字列にして渡す', () => {
      const { connection, socket } = connect();
      const onClose = vi.fn();
      connection.onClose(onClose);

      socket.emit('close', 1006, Buffer.from('abnormal'));

      expect(onClose).toHaveBeenCalledWith(1006, 'abnormal');
    });

    it('open と pong をコールバックに渡す', () => {
      const { connection, socket } = connect();
      const onOpen = vi.fn();
      const onPong = vi.fn();
      connection.onOpen(onOpen);
      connection.onPong(onPong);

      socket.emit('open');
      socket.emit('pong');

      expect(onOpen).toHaveBeenCalledTimes(1);
      expect(onPong).toHaveBeenCalledTimes(1);
    });
  });

  describe('ハンドシェイクの拒否', () => {
    it('401 は AuthenticationError を通知してソケットを切る', () => {
      const { connection, socket } = connect();
      const onError = vi.fn<(error: Error) => void>();
      connection.onError(onError);

      socket.emit('unexpected-response', {}, { statusCode: 401 });

      const error = onError.mock.calls[0]?.[0];
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ statusCode: 401, code: 'AUTHENTICATION_FAILED' });
      expect(socket.terminate).toHaveBeenCalledTimes(1);
    });

    it('それ以外のステータスは TransportError', () => {
      const { connection, socket } = connect();
      const onError = vi.fn<(error: Error) => void>();
      connection.onError(onError);

      socket.emit('unexpected-response', {}, { statusCode: 503 });

      const error = onError.mock.calls[0]?.[0];
      expect(error).toBeInstanceOf(TransportError);
      expect(error).not.toBeInstanceOf(AuthenticationError);
      expect(error?.message).toBe('Unexpected server response: 503');
    });
  });

  describe('送信', () => {
    it('send() の書き込みエラーは onError に通知する', () => {
      const { connection, socket } = connect();
      const onError = vi.fn();
      connection.onError(onError);
      const failure = new Error('write EPIPE');
      socket.send.mockImplementation((_data, cb) => cb?.(failure));

      connection.send('{"a":"subscribe","v":[1]}');

      expect(socket.send).toHaveBeenCalledWith('{"a":"subscribe","v":[1]}', expect.any(Function));
      expect(onError).toHaveBeenCalledWith(failure);
    });

    it('ping / close / terminate はソケットに委譲する', () => {
      const { connection, socket } = connect();

      connection.ping();
      connection.close(1000, 'client closed');
      connection.terminate();

      expect(socket.ping).toHaveBeenCalledTimes(1);
      expect(socket.close).toHaveBeenCalledWith(1000, 'client closed');
      expect(socket.terminate).toHaveBeenCalledTimes(1);
    });
  });

  it('removeAllListeners() 後はコールバックを呼ばない', () => {
    const { connection, socket } = connect();
    const onClose = vi.fn();
    connection.onClose(onClose);

    connection.removeAllListeners();
    socket.emit('close', 1000, Buffer.from(''));

    expect(onClose).not.toHaveBeenCalled();
  });

  it('isOpen は readyState が OPEN のときだけ true', () => {
    const { connection, socket } = connect();
    expect(connection.isOpen).toBe(false);

    socket.readyState = 1;
    expect(connection.isOpen).toBe(true);
  });
});
