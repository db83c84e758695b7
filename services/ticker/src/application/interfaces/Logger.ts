/**
 * ロガーインターフェース
 *
 * ティッカーの各コンポーネントはこのインターフェース越しに構造化ログを出す。
 * 実装は pino（infra/logger）。テストでは LoggerMock に差し替える。
 */
export interface Logger {
  debug(msg: string, meta?: object): void;

  info(msg: string, meta?: object): void;

  warn(msg: string, meta?: object): void;

  /**
   * エラーは meta の `err` キーに渡す（pino の標準シリアライザが stack を展開する）
   */
  error(msg: string, meta?: object): void;

  /**
   * コンテキスト（component, instrumentToken など）を固定した子ロガーを作成
   * @param bindings 以降のすべてのログに付与される情報
   */
  child(bindings: object): Logger;
}
