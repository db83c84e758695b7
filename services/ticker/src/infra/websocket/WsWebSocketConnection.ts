import type { ClientRequest, IncomingMessage } from 'node:http';
import WebSocket, { type RawData } from 'ws';
import { AuthenticationError, TransportError } from '@/domain/errors';
import type { ConnectionRequest, WebSocketConnection } from './interfaces/WebSocketConnection';

/**
 * ws パッケージを使った WebSocket 接続の実装
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: Buffer, isBinary: boolean) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];
  private pongCallbacks: Array<() => void> = [];

  constructor(private readonly socket: WebSocket) {
    // ws のイベントを内部で管理（removeAllListeners() 後もソケット側のリスナーは残す）
    this.socket.on('open', () => {
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data: RawData, isBinary: boolean) => {
      const buffer = toBuffer(data);
      for (const cb of this.messageCallbacks) {
        cb(buffer, isBinary);
      }
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      const text = reason.toString('utf8');
      for (const cb of this.closeCallbacks) {
        cb(code, text);
      }
    });

    this.socket.on('error', (error: Error) => {
      this.emitError(error);
    });

    this.socket.on('pong', () => {
      for (const cb of this.pongCallbacks) {
        cb();
      }
    });

    // リスナーを登録すると ws は自動で中断しないので、エラーを通知してから自分で切る
    this.socket.on('unexpected-response', (_req: ClientRequest, res: IncomingMessage) => {
      const status = res.statusCode ?? 0;
      this.emitError(
        status === 401 || status === 403
          ? new AuthenticationError(status)
          : new TransportError(`Unexpected server response: ${status}`)
      );
      this.socket.terminate();
    });
  }

  /**
   * URL とヘッダーから接続を生成する（WebSocketConnectionFactory の既定実装）
   */
  static connect(request: ConnectionRequest): WsWebSocketConnection {
    return new WsWebSocketConnection(new WebSocket(request.url, { headers: request.headers }));
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: Buffer, isBinary: boolean) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  onPong(callback: () => void): void {
    this.pongCallbacks.push(callback);
  }

  send(data: string): void {
    // 書き込みエラーは error コールバックに回す
    this.socket.send(data, (error?: Error) => {
      if (error) {
        this.emitError(error);
      }
    });
  }

  ping(): void {
    this.socket.ping();
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
    this.pongCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  private emitError(error: Error): void {
    for (const cb of this.errorCallbacks) {
      cb(error);
    }
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}
