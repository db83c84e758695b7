import type {
  ConnectionRequest,
  WebSocketConnection,
  WebSocketConnectionFactory,
} from '@/infra/websocket/interfaces/WebSocketConnection';

/**
 * テスト用のプロセス内 WebSocket 接続
 *
 * サーバー側の振る舞いは simulate* で起こす。送信したフレームは sent に溜まる。
 */
export class FakeWebSocketConnection implements WebSocketConnection {
  readonly sent: string[] = [];
  pings = 0;
  closedWith: { code?: number; reason?: string } | null = null;
  terminated = false;
  private open = false;

  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: Buffer, isBinary: boolean) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];
  private pongCallbacks: Array<() => void> = [];

  constructor(readonly request: ConnectionRequest) {}

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
    this.sent.push(data);
  }

  ping(): void {
    this.pings += 1;
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
    this.open = false;
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
    this.pongCallbacks = [];
  }

  terminate(): void {
    this.terminated = true;
    this.open = false;
  }

  get isOpen(): boolean {
    return this.open;
  }

  /** 送信済みフレームを JSON として読む */
  sentCommands(): unknown[] {
    return this.sent.map((text) => JSON.parse(text));
  }

  simulateOpen(): void {
    this.open = true;
    for (const cb of [...this.openCallbacks]) {
      cb();
    }
  }

  simulateBinary(frame: Buffer): void {
    for (const cb of [...this.messageCallbacks]) {
      cb(frame, true);
    }
  }

  simulateText(text: string): void {
    const buffer = Buffer.from(text, 'utf8');
    for (const cb of [...this.messageCallbacks]) {
      cb(buffer, false);
    }
  }

  simulatePong(): void {
    for (const cb of [...this.pongCallbacks]) {
      cb();
    }
  }

  simulateClose(code: number, reason = ''): void {
    this.open = false;
    for (const cb of [...this.closeCallbacks]) {
      cb(code, reason);
    }
  }

  simulateError(error: Error): void {
    for (const cb of [...this.errorCallbacks]) {
      cb(error);
    }
  }
}

/**
 * 生成した接続を順に記録するファクトリー
 */
export function createFakeConnectionFactory(): {
  factory: WebSocketConnectionFactory;
  connections: FakeWebSocketConnection[];
  latest: () => FakeWebSocketConnection;
} {
  const connections: FakeWebSocketConnection[] = [];
  return {
    factory: (request) => {
      const connection = new FakeWebSocketConnection(request);
      connections.push(connection);
      return connection;
    },
    connections,
    latest: () => {
      const connection = connections.at(-1);
      if (!connection) {
        throw new Error('No connection has been created yet');
      }
      return connection;
    },
  };
}
