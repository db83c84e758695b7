import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ReconnectExhaustedError } from '@/domain/errors';
import type { ReconnectEvent } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type BackoffOptions, BackoffStrategy } from './BackoffStrategy';

export const DEFAULT_MAX_RETRIES = 50;

export interface ReconnectManagerOptions {
  backoff?: BackoffOptions;
  /** 連続失敗の上限。null は無制限 */
  maxRetries?: number | null;
  /** 失敗した接続を再試行するかどうか（false なら再接続をスケジュールしない） */
  shouldRetry?: (error: unknown) => boolean;
  /** 再接続をスケジュールした直後に呼ばれる */
  onScheduled?: (event: ReconnectEvent) => void;
  /** リトライ上限に達したときに 1 度だけ呼ばれる */
  onExhausted?: (error: ReconnectExhaustedError) => void;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * インフラ層: 再接続スケジューラ（connect 関数を受け取って再試行）
 *
 * 責務: 再接続のスケジュール管理。接続関数を受け取り、失敗時に自動的に再接続を試みる。
 * scheduleReconnect() は待機中のタイマーがあれば何もしないので、
 * セッションの終了通知と接続関数の reject が両方届いても 1 回分しか数えない。
 */
export class ReconnectManager {
  private readonly backoff: BackoffStrategy;
  private readonly maxRetries: number | null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private stopped = false;
  private readonly logger: Logger;

  /**
   * @param connectFn 再接続時に実行する接続関数（接続確立で resolve、失敗で reject）
   */
  constructor(
    private readonly connectFn: () => Promise<void>,
    private readonly options: ReconnectManagerOptions = {}
  ) {
    this.backoff = new BackoffStrategy(options.backoff);
    this.maxRetries = options.maxRetries === undefined ? DEFAULT_MAX_RETRIES : options.maxRetries;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'ReconnectManager' });
  }

  /**
   * 再接続管理を開始する。
   */
  async start(): Promise<void> {
    this.stopped = false;
    await this.safeConnect();
  }

  /**
   * 再接続をスケジュールする。
   * 停止済み、または既にスケジュール済みの場合は何もしない。
   */
  scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) {
      return;
    }

    if (this.maxRetries !== null && this.backoff.attempts >= this.maxRetries) {
      this.stopped = true;
      const error = new ReconnectExhaustedError(this.backoff.attempts);
      this.logger.error('Reconnect attempts exhausted', { err: error, maxRetries: this.maxRetries });
      this.options.onExhausted?.(error);
      return;
    }

    const delayMs = this.backoff.getNextDelay();
    const attempt = this.backoff.attempts;
    this.logger.info('Reconnect scheduled', { attempt, delayMs });

    // メトリクス収集: 再接続回数
    this.options.metricsCollector?.incrementReconnect();

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.safeConnect();
    }, delayMs);
    this.options.onScheduled?.({ attempt, delayMs });
  }

  /**
   * 接続が確立したことを通知する。試行回数を 0 に戻す。
   */
  markConnected(): void {
    this.backoff.reset();
  }

  /**
   * 再接続管理を停止する。待機中のタイマーも破棄する。
   */
  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  /** 直近の連続失敗回数 */
  get attempts(): number {
    return this.backoff.attempts;
  }

  /** 再接続タイマーの待機中かどうか */
  get isPending(): boolean {
    return this.reconnectTimer !== null;
  }

  /**
   * 安全に接続を試みる。
   * 成功時はバックオフをリセットし（再接続が待機中でなければ）、失敗時は再接続をスケジュールする。
   */
  private async safeConnect(): Promise<void> {
    if (this.stopped) {
      return;
    }
    try {
      await this.connectFn();
      // 接続直後に切断されて次の再接続が既に待機中なら、数えた試行を消さない
      if (!this.reconnectTimer) {
        this.markConnected();
      }
    } catch (error) {
      this.logger.warn('Connect attempt failed', { err: error, attempt: this.backoff.attempts });

      const retry = this.options.shouldRetry ? this.options.shouldRetry(error) : true;
      if (retry) {
        this.scheduleReconnect();
      }
    }
  }
}
