import process from 'node:process';
import { ConfigurationError } from '@/domain/errors';
import { DEFAULT_SUBSCRIPTION_MODE, type InstrumentToken, type SubscriptionMode } from '@/domain/types';
import { isSubscriptionMode } from '@/infra/subscription/SubscriptionRegistry';

/**
 * コレクタープロセスの起動パラメータ（`.env` から読み込む）
 */
export interface CollectorConfig {
  apiKey: string;
  accessToken: string;
  tokens: InstrumentToken[];
  mode: SubscriptionMode;
  wsUrl?: string;
  /** undefined は既定値、null は無制限 */
  maxRetries?: number | null;
  maxReconnectDelayMs?: number;
  redisUrl: string;
  /** 未設定なら /metrics を公開しない */
  metricsPort?: number;
}

type Env = Record<string, string | undefined>;

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @throws {ConfigurationError} 環境変数が未設定の場合
 */
export function requireEnv(key: string, env: Env = process.env): string {
  const value = env[key];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * 整数の環境変数を読む。未設定なら undefined。
 */
export function optionalIntEnv(key: string, env: Env = process.env): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${key} must be an integer (got "${value}")`);
  }
  return parsed;
}

/**
 * カンマ区切りのトークン一覧を数値配列にする
 */
export function parseTokenList(value: string): InstrumentToken[] {
  const tokens = value
    .split(',')
    .map((token) => token.trim())
    .filter(Boolean)
    .map((token) => {
      const parsed = Number(token);
      if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigurationError(`Invalid instrument token in TICKER_TOKENS: "${token}"`);
      }
      return parsed;
    });

  if (tokens.length === 0) {
    throw new ConfigurationError('TICKER_TOKENS must contain at least one token');
  }
  return tokens;
}

/**
 * 環境変数からコレクターの設定を組み立てる。
 * TICKER_MAX_RETRIES は整数か `unlimited`。
 */
export function loadCollectorConfig(env: Env = process.env): CollectorConfig {
  const mode = env.TICKER_MODE ?? DEFAULT_SUBSCRIPTION_MODE;
  if (!isSubscriptionMode(mode)) {
    throw new ConfigurationError(`TICKER_MODE must be one of ltp, quote, full (got "${mode}")`);
  }

  return {
    apiKey: requireEnv('TICKER_API_KEY', env),
    accessToken: requireEnv('TICKER_ACCESS_TOKEN', env),
    tokens: parseTokenList(requireEnv('TICKER_TOKENS', env)),
    mode,
    wsUrl: env.TICKER_WS_URL || undefined,
    maxRetries: env.TICKER_MAX_RETRIES === 'unlimited' ? null : optionalIntEnv('TICKER_MAX_RETRIES', env),
    maxReconnectDelayMs: optionalIntEnv('TICKER_MAX_RECONNECT_DELAY_MS', env),
    redisUrl: requireEnv('REDIS_URL', env),
    metricsPort: optionalIntEnv('METRICS_PORT', env),
  };
}
