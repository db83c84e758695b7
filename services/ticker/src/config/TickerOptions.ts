import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ConfigurationError } from '@/domain/errors';
import { DEFAULT_SUBSCRIPTION_MODE, type SubscriptionMode } from '@/domain/types';
import type { PriceDivisorOverrides } from '@/infra/codec/PriceDivisorTable';
import { type BackpressurePolicy, DEFAULT_DRAIN_BATCH_SIZE, DEFAULT_QUEUE_CAPACITY } from '@/infra/dispatch/EventDispatcher';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type BackoffOptions, DEFAULT_BACKOFF } from '@/infra/reconnect/BackoffStrategy';
import { DEFAULT_MAX_RETRIES } from '@/infra/reconnect/ReconnectManager';
import { isSubscriptionMode } from '@/infra/subscription/SubscriptionRegistry';
import type { WebSocketConnectionFactory } from '@/infra/websocket/interfaces/WebSocketConnection';
import { WsWebSocketConnection } from '@/infra/websocket/WsWebSocketConnection';

export const DEFAULT_TICKER_URL = 'wss://ws.kite.trade';
export const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 2500;
export const DEFAULT_HEARTBEAT_TIMEOUT_MULTIPLIER = 2;

/**
 * TickerClient の設定。apiKey と accessToken 以外はすべて省略可能。
 */
export interface TickerOptions {
  apiKey: string;
  /** REST 側のログインで得たアクセストークン（クライアントは更新しない） */
  accessToken: string;
  url?: string;
  connectTimeoutMs?: number;
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMultiplier?: number;
  /** false の場合、どの切断でも再接続せず disconnected に戻る */
  autoReconnect?: boolean;
  /** 連続失敗の上限。null は無制限 */
  maxRetries?: number | null;
  reconnect?: BackoffOptions;
  /** subscribe() で付与するモード */
  defaultMode?: SubscriptionMode;
  queueCapacity?: number;
  drainBatchSize?: number;
  backpressure?: BackpressurePolicy;
  priceDivisors?: PriceDivisorOverrides;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  connectionFactory?: WebSocketConnectionFactory;
}

export interface ResolvedTickerOptions {
  apiKey: string;
  accessToken: string;
  url: string;
  connectTimeoutMs: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMultiplier: number;
  autoReconnect: boolean;
  maxRetries: number | null;
  reconnect: BackoffOptions;
  defaultMode: SubscriptionMode;
  queueCapacity: number;
  drainBatchSize: number;
  backpressure: BackpressurePolicy;
  priceDivisors: PriceDivisorOverrides;
  logger: Logger;
  metricsCollector?: MetricsCollector;
  connectionFactory: WebSocketConnectionFactory;
}

/**
 * 既定値を補い、値を検証する
 * @throws {ConfigurationError} 必須項目の欠落、範囲外の値
 */
export function resolveTickerOptions(options: TickerOptions): ResolvedTickerOptions {
  const apiKey = requireText(options.apiKey, 'apiKey');
  const accessToken = requireText(options.accessToken, 'accessToken');
  const url = options.url ?? DEFAULT_TICKER_URL;
  assertWebSocketUrl(url);

  const maxRetries = options.maxRetries === undefined ? DEFAULT_MAX_RETRIES : options.maxRetries;
  if (maxRetries !== null) {
    assertInteger(maxRetries, 'maxRetries', 0);
  }

  const defaultMode = options.defaultMode ?? DEFAULT_SUBSCRIPTION_MODE;
  if (!isSubscriptionMode(defaultMode)) {
    throw new ConfigurationError(`Unknown subscription mode: ${String(defaultMode)}`);
  }

  const backpressure = options.backpressure ?? 'dropOldest';
  if (backpressure !== 'dropOldest' && backpressure !== 'dropNewest') {
    throw new ConfigurationError(`Unknown backpressure policy: ${String(backpressure)}`);
  }

  const resolved: ResolvedTickerOptions = {
    apiKey,
    accessToken,
    url,
    connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
    heartbeatIntervalMs: options.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
    heartbeatTimeoutMultiplier: options.heartbeatTimeoutMultiplier ?? DEFAULT_HEARTBEAT_TIMEOUT_MULTIPLIER,
    autoReconnect: options.autoReconnect ?? true,
    maxRetries,
    reconnect: { ...DEFAULT_BACKOFF, ...options.reconnect },
    defaultMode,
    queueCapacity: options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
    drainBatchSize: options.drainBatchSize ?? DEFAULT_DRAIN_BATCH_SIZE,
    backpressure,
    priceDivisors: options.priceDivisors ?? {},
    logger: options.logger ?? LoggerFactory.create(),
    metricsCollector: options.metricsCollector,
    connectionFactory: options.connectionFactory ?? WsWebSocketConnection.connect,
  };

  assertInteger(resolved.connectTimeoutMs, 'connectTimeoutMs', 1);
  assertInteger(resolved.heartbeatIntervalMs, 'heartbeatIntervalMs', 1);
  if (!(resolved.heartbeatTimeoutMultiplier >= 1)) {
    throw new ConfigurationError(
      `heartbeatTimeoutMultiplier must be >= 1 (got ${resolved.heartbeatTimeoutMultiplier})`
    );
  }

  return resolved;
}

function requireText(value: string, name: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${name} is required`);
  }
  return value;
}

function assertWebSocketUrl(value: string): void {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (error) {
    throw new ConfigurationError(`Invalid url: ${value}`, { cause: error });
  }
  if (parsed.protocol !== 'ws:' && parsed.protocol !== 'wss:') {
    throw new ConfigurationError(`url must use ws: or wss: (got ${parsed.protocol})`);
  }
}

function assertInteger(value: number, name: string, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min} (got ${value})`);
  }
}
