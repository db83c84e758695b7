import type { Tick } from '@/domain/types';

/**
 * ティックの配信先のインターフェイス（インフラ層で実装される）。
 */
export interface TickPublisher {
  /**
   * デコード済みのティックを 1 件配信する。
   */
  publish(tick: Tick): Promise<void>;

  close(): Promise<void>;
}
