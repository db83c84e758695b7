import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { ConnectionState } from '@/domain/types';

/**
 * メトリクス HTTP サーバー
 *
 * 責務:
 * - /metrics で Prometheus 形式のメトリクスを公開
 * - /healthz でティッカーの接続状態を返す（connected 以外は 503）
 */
export class MetricsServer {
  private server: Server | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    logger: Logger,
    private readonly stateProvider?: () => ConnectionState
  ) {
    this.logger = logger.child({ component: 'MetricsServer' });
  }

  /**
   * HTTP サーバーを起動（listen 完了で resolve）
   */
  start(): Promise<void> {
    const server = createServer((req, res) => {
      void this.handle(req, res);
    });
    this.server = server;

    return new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, () => {
        server.off('error', reject);
        this.logger.info('Metrics server started', { port: this.port });
        resolve();
      });
    });
  }

  /**
   * HTTP サーバーを停止
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.method !== 'GET') {
      res.statusCode = 405;
      res.end('Method Not Allowed');
      return;
    }

    switch (req.url) {
      case '/metrics':
        try {
          const metrics = await this.metricsCollector.getMetrics();
          res.setHeader('Content-Type', this.metricsCollector.getRegistry().contentType);
          res.statusCode = 200;
          res.end(metrics);
        } catch (error) {
          this.logger.error('Failed to get metrics', { err: error });
          res.statusCode = 500;
          res.end('Internal Server Error');
        }
        return;
      case '/healthz': {
        const state = this.stateProvider?.() ?? 'disconnected';
        res.setHeader('Content-Type', 'application/json');
        res.statusCode = state === 'connected' ? 200 : 503;
        res.end(JSON.stringify({ state }));
        return;
      }
      default:
        res.statusCode = 404;
        res.end('Not Found');
    }
  }
}
