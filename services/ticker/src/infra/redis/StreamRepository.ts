import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TickPublisher } from '@/domain/repositories/TickPublisher';
import type { SubscriptionMode, Tick } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * インフラ層: Redis Stream への書き込み実装
 *
 * 責務: Tick をモード別の Redis Stream（md:tick:<mode>）に XADD する。
 */
export class StreamRepository implements TickPublisher {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param redisUrl Redis 接続 URL
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    redisUrl: string,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.redis = new Redis(redisUrl);
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'StreamRepository' });
  }

  async publish(tick: Tick): Promise<void> {
    const stream = StreamRepository.streamName(tick.mode);
    try {
      const payload = {
        token: String(tick.instrumentToken),
        mode: tick.mode,
        ts: String(tickTimestamp(tick)),
        data: JSON.stringify(tick),
      };

      // XADD コマンドでメッセージを追加
      await this.redis.xadd(stream, '*', ...Object.entries(payload).flat());

      // メトリクス収集: 配信メッセージ数
      this.metricsCollector?.incrementPublished(stream);
    } catch (error) {
      this.logger.debug('XADD failed', { stream, instrumentToken: tick.instrumentToken });
      // メトリクス収集: 配信エラー
      this.metricsCollector?.incrementError('PUBLISH_ERROR');
      throw error;
    }
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }

  /**
   * モードから Redis Stream 名を取得する。
   */
  static streamName(mode: SubscriptionMode): string {
    return `md:tick:${mode}`;
  }
}

/**
 * 取引所のタイムスタンプがあればそれを、なければ受信時刻（エポックミリ秒）を使う
 */
function tickTimestamp(tick: Tick): number {
  if ((tick.kind === 'full' || tick.kind === 'index') && tick.exchangeTimestamp) {
    return tick.exchangeTimestamp.getTime();
  }
  return Date.now();
}
