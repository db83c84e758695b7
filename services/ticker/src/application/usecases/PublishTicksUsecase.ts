import type { Logger } from '@/application/interfaces/Logger';
import type { TickPublisher } from '@/domain/repositories/TickPublisher';
import type { Tick } from '@/domain/types';

/**
 * アプリケーション層: ティック配信ユースケース
 *
 * 責務: 1 フレーム分のティックを順番に配信する司令塔。1 件の失敗でバッチ全体を止めない。
 */
export class PublishTicksUsecase {
  constructor(
    private readonly publisher: TickPublisher,
    private readonly logger: Logger
  ) {}

  /**
   * @returns 配信に成功した件数
   */
  async execute(ticks: readonly Tick[]): Promise<number> {
    let published = 0;
    for (const tick of ticks) {
      try {
        await this.publisher.publish(tick);
        published += 1;
      } catch (error) {
        this.logger.error('Failed to publish tick', {
          err: error,
          instrumentToken: tick.instrumentToken,
          mode: tick.mode,
        });
      }
    }
    return published;
  }
}
