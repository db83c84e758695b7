import 'dotenv/config';
import process from 'node:process';
import { PublishTicksUsecase } from '@/application/usecases/PublishTicksUsecase';
import { loadCollectorConfig } from '@/config/env';
import { ReconnectExhaustedError } from '@/domain/errors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { StreamRepository } from '@/infra/redis/StreamRepository';
import { TickerClient } from '@/presentation/ticker/TickerClient';

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と初期化
 * - シグナルハンドリング
 *
 * 注意: 接続やデコードの挙動は TickerClient に閉じ込め、main.ts はただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const config = loadCollectorConfig();
  const logger = LoggerFactory.create().child({ component: 'collector' });

  // インフラ層: メトリクスと Stream Repository を生成
  const metrics = new PrometheusMetricsCollector();
  const publisher = new StreamRepository(config.redisUrl, logger, metrics);

  // アプリケーション層: ティック配信ユースケース
  const usecase = new PublishTicksUsecase(publisher, logger);

  const client = new TickerClient({
    apiKey: config.apiKey,
    accessToken: config.accessToken,
    url: config.wsUrl,
    maxRetries: config.maxRetries,
    reconnect: { maxDelayMs: config.maxReconnectDelayMs },
    logger,
    metricsCollector: metrics,
  });

  const metricsServer =
    config.metricsPort === undefined ? null : new MetricsServer(metrics, config.metricsPort, logger, () => client.state);

  let shuttingDown = false;
  const shutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down collector...');
    // SIGINT/SIGTERM でクライアントを止め、Redis と HTTP サーバーも閉じる。
    client.stop();
    try {
      await metricsServer?.stop();
      await publisher.close();
    } catch (error) {
      logger.error('Error during shutdown', { err: error });
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  client.on('tick', (ticks) => {
    void usecase.execute(ticks);
  });
  client.on('connect', () => {
    logger.info('Ticker connected', { subscriptions: client.subscriptions().size });
  });
  client.on('reconnect', ({ attempt, delayMs }) => {
    logger.warn('Ticker reconnecting', { attempt, delayMs });
  });
  client.on('close', ({ reason, code }) => {
    logger.info('Ticker closed', { reason, code });
  });
  client.on('error', (error) => {
    logger.error('Ticker error', { err: error });
    // リトライ上限に達したらプロセスを落としてスーパーバイザーに任せる
    if (error instanceof ReconnectExhaustedError) {
      void shutdown(1);
    }
  });

  // モード指定で購読（未購読なら暗黙的に subscribe される）。接続後にリプレイされる。
  client.setMode(config.mode, config.tokens);

  await metricsServer?.start();
  await client.connect();

  process.on('SIGINT', () => void shutdown(0));
  process.on('SIGTERM', () => void shutdown(0));
}

bootstrap().catch((error: unknown) => {
  LoggerFactory.create().error('Failed to bootstrap collector', { err: error });
  process.exit(1);
});
