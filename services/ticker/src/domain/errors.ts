/**
 * ドメイン層: ティッカーのエラー分類
 *
 * - TransportError: ソケット・ハンドシェイクの失敗（セッション終了 → 再接続）
 * - ProtocolError: 不正なフレーム（フレームを読み捨てて継続）
 * - ServerMessageError: サーバーから届いた error メッセージ（接続は維持）
 * - HeartbeatTimeoutError: 応答途絶（TransportError として扱う）
 * - AuthenticationError: ハンドシェイクの拒否（TransportError だが呼び出し側で区別できる）
 * - ConfigurationError: 不正なトークン・モード・設定値（同期的に throw し、再接続しない）
 * - ReconnectExhaustedError: リトライ上限到達（唯一の致命的エラー）
 * - IllegalStateError: stop() 済みのクライアントの操作
 */
export abstract class TickerError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransportError extends TickerError {
  readonly code: string = 'TRANSPORT_ERROR';
}

export class HeartbeatTimeoutError extends TransportError {
  override readonly code = 'HEARTBEAT_TIMEOUT';

  constructor(readonly silentForMs: number) {
    super(`No frame or pong received for ${silentForMs}ms`);
  }
}

export class AuthenticationError extends TransportError {
  override readonly code = 'AUTHENTICATION_FAILED';

  constructor(readonly statusCode: number) {
    super(`Handshake rejected with HTTP ${statusCode}`);
  }
}

export class ProtocolError extends TickerError {
  readonly code = 'PROTOCOL_ERROR';
}

export class ServerMessageError extends TickerError {
  readonly code = 'SERVER_ERROR';
}

export class ConfigurationError extends TickerError {
  readonly code = 'CONFIGURATION_ERROR';
}

export class ReconnectExhaustedError extends TickerError {
  readonly code = 'RECONNECT_EXHAUSTED';

  constructor(readonly attempts: number) {
    super(`Gave up reconnecting after ${attempts} attempts`);
  }
}

export class IllegalStateError extends TickerError {
  readonly code = 'ILLEGAL_STATE';
}

/**
 * 任意の値を TickerError に揃える。未知のエラーは TransportError として包む。
 */
export function toTickerError(error: unknown): TickerError {
  if (error instanceof TickerError) {
    return error;
  }
  if (error instanceof Error) {
    return new TransportError(error.message, { cause: error });
  }
  return new TransportError(String(error));
}
