import { ConfigurationError } from '@/domain/errors';

export interface BackoffOptions {
  /** 初回の遅延（ミリ秒） */
  baseDelayMs?: number;
  /** 遅延の上限（ミリ秒） */
  maxDelayMs?: number;
  /** 試行ごとの倍率 */
  factor?: number;
  /** 乱数で上乗せする割合（0〜factor-1） */
  jitter?: number;
  /** [0, 1) の乱数源（テストで固定するため差し替え可能） */
  random?: () => number;
}

export const DEFAULT_BACKOFF = {
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  factor: 2,
  jitter: 0.1,
} as const;

/**
 * インフラ層: 指数バックオフ戦略の実装
 *
 * delay = min(base * factor^(attempt-1) * (1 + jitter * rand), max)
 *
 * jitter が factor-1 以下であれば、乱数の値によらず遅延は単調非減少になる。
 */
export class BackoffStrategy {
  private attempt = 0;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly factor: number;
  private readonly jitter: number;
  private readonly random: () => number;

  constructor(options: BackoffOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs;
    this.factor = options.factor ?? DEFAULT_BACKOFF.factor;
    this.jitter = options.jitter ?? DEFAULT_BACKOFF.jitter;
    this.random = options.random ?? Math.random;

    if (!(this.baseDelayMs > 0) || !(this.maxDelayMs >= this.baseDelayMs)) {
      throw new ConfigurationError(
        `Backoff delays must satisfy 0 < base <= max (base=${this.baseDelayMs}, max=${this.maxDelayMs})`
      );
    }
    if (!(this.factor >= 1)) {
      throw new ConfigurationError(`Backoff factor must be >= 1 (got ${this.factor})`);
    }
    if (!(this.jitter >= 0) || this.jitter > this.factor - 1) {
      throw new ConfigurationError(`Backoff jitter must be within [0, factor - 1] (got ${this.jitter})`);
    }
  }

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得し、試行回数を 1 進める。
   */
  getNextDelay(): number {
    this.attempt += 1;
    const exponential = this.baseDelayMs * this.factor ** (this.attempt - 1);
    const jittered = exponential * (1 + this.jitter * this.random());
    return Math.min(Math.round(jittered), this.maxDelayMs);
  }

  /**
   * これまでに getNextDelay() を呼んだ回数（1 始まりの試行番号）
   */
  get attempts(): number {
    return this.attempt;
  }

  /**
   * バックオフカウンターをリセットする。
   * 接続成功時に呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }
}
