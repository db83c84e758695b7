/**
 * インフラ層: WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: WebSocket 接続の確立・管理・イベント処理を抽象化する。
 * セッションはこのインターフェースだけに依存し、テストではフェイク実装に差し替える。
 */
export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * メッセージを受信したときに呼ばれるコールバック
   * バイナリ・テキストどちらも Buffer で渡し、isBinary で区別する
   */
  onMessage(callback: (data: Buffer, isBinary: boolean) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): void;

  /**
   * エラーが発生したときに呼ばれるコールバック
   * ハンドシェイクが 401/403 で拒否された場合は AuthenticationError が渡る
   */
  onError(callback: (error: Error) => void): void;

  /**
   * pong を受信したときに呼ばれるコールバック
   */
  onPong(callback: () => void): void;

  /**
   * テキストフレームを送信する
   */
  send(data: string): void;

  /**
   * ping フレームを送信する
   */
  ping(): void;

  /**
   * クローズハンドシェイクを開始する
   */
  close(code?: number, reason?: string): void;

  /**
   * すべてのイベントリスナーを削除する
   */
  removeAllListeners(): void;

  /**
   * 接続を強制終了する
   */
  terminate(): void;

  /** 送信可能な状態かどうか */
  readonly isOpen: boolean;
}

export interface ConnectionRequest {
  url: string;
  headers: Record<string, string>;
}

/**
 * 接続を生成する関数。セッションは接続のたびにこれを呼ぶ。
 */
export type WebSocketConnectionFactory = (request: ConnectionRequest) => WebSocketConnection;
