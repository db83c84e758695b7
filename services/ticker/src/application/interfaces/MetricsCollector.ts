import type { ConnectionState, SubscriptionMode } from '@/domain/types';

/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: ティッカーとコレクターの稼働状況の収集・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * デコードしたティック数をカウント
   * @param mode ティックのモード（ltp, quote, full）
   * @param count バッチ内の件数
   */
  incrementTicks(mode: SubscriptionMode, count: number): void;

  /**
   * 未知の長さで部分デコードしたパケット数をカウント
   */
  incrementPartialPackets(): void;

  /**
   * エラー数をカウント
   * @param code TickerError のコード（PROTOCOL_ERROR, TRANSPORT_ERROR など）
   */
  incrementError(code: string): void;

  /**
   * 再接続の試行回数をカウント
   */
  incrementReconnect(): void;

  /**
   * バックプレッシャーで破棄したイベント数をカウント
   * @param kind イベント種別（tick）
   */
  incrementDropped(kind: string): void;

  /**
   * 配信したティック数をカウント
   * @param stream Redis Stream 名
   */
  incrementPublished(stream: string): void;

  /**
   * 現在の接続状態を記録
   */
  setConnectionState(state: ConnectionState): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
