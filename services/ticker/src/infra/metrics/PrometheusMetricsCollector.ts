import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { ConnectionState, SubscriptionMode } from '@/domain/types';

const CONNECTION_STATES: readonly ConnectionState[] = [
  'disconnected',
  'connecting',
  'connected',
  'reconnecting',
  'closed',
];

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用してメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly ticksCounter: Counter;
  private readonly partialCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly reconnectCounter: Counter;
  private readonly droppedCounter: Counter;
  private readonly publishedCounter: Counter;
  private readonly stateGauge: Gauge;

  constructor(prefix = 'ticker') {
    this.register = new Registry();

    this.ticksCounter = new Counter({
      name: `${prefix}_ticks_received_total`,
      help: 'Total number of ticks decoded from binary frames',
      labelNames: ['mode'],
      registers: [this.register],
    });

    this.partialCounter = new Counter({
      name: `${prefix}_partial_packets_total`,
      help: 'Total number of packets with an unknown length decoded as LTP only',
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: `${prefix}_errors_total`,
      help: 'Total number of errors',
      labelNames: ['code'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: `${prefix}_reconnects_total`,
      help: 'Total number of scheduled reconnection attempts',
      registers: [this.register],
    });

    this.droppedCounter = new Counter({
      name: `${prefix}_events_dropped_total`,
      help: 'Total number of events dropped by dispatcher backpressure',
      labelNames: ['kind'],
      registers: [this.register],
    });

    this.publishedCounter = new Counter({
      name: `${prefix}_ticks_published_total`,
      help: 'Total number of ticks published to Redis Stream',
      labelNames: ['stream'],
      registers: [this.register],
    });

    // 状態ごとに 0/1 を持つゲージ
    this.stateGauge = new Gauge({
      name: `${prefix}_connection_state`,
      help: 'Current connection state (1 for the active state)',
      labelNames: ['state'],
      registers: [this.register],
    });
    this.setConnectionState('disconnected');
  }

  incrementTicks(mode: SubscriptionMode, count: number): void {
    this.ticksCounter.inc({ mode }, count);
  }

  incrementPartialPackets(): void {
    this.partialCounter.inc();
  }

  incrementError(code: string): void {
    this.errorCounter.inc({ code });
  }

  incrementReconnect(): void {
    this.reconnectCounter.inc();
  }

  incrementDropped(kind: string): void {
    this.droppedCounter.inc({ kind });
  }

  incrementPublished(stream: string): void {
    this.publishedCounter.inc({ stream });
  }

  setConnectionState(state: ConnectionState): void {
    for (const candidate of CONNECTION_STATES) {
      this.stateGauge.set({ state: candidate }, candidate === state ? 1 : 0);
    }
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    // Registry は MetricsRegistry インターフェースを満たす（contentType プロパティを持つ）
    return this.register;
  }
}
