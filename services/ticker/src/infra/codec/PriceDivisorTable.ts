import { ConfigurationError } from '@/domain/errors';
import type { InstrumentToken } from '@/domain/types';

/** インデックスセグメント（売買不可） */
export const INDICES_SEGMENT = 9;

/**
 * セグメントごとの価格除数の既定値。
 * 3: NSE 通貨デリバティブ、6: BSE 通貨デリバティブ。それ以外は paise → rupee の 100。
 */
export const DEFAULT_SEGMENT_DIVISORS: Readonly<Record<number, number>> = {
  3: 10_000_000,
  6: 10_000,
};

export const DEFAULT_PRICE_DIVISOR = 100;

export interface PriceDivisorOverrides {
  /** セグメント番号 → 除数 */
  segments?: Record<number, number>;
  /** テーブルに無いセグメントの除数 */
  fallback?: number;
}

/**
 * インフラ層: 銘柄トークンの下位ビットから価格除数を引くルックアップテーブル
 *
 * 取引所・セグメント固有のルールなので、算術ではなく差し替え可能なテーブルとして持つ。
 */
export class PriceDivisorTable {
  private readonly divisors = new Map<number, number>();
  private readonly fallback: number;

  constructor(overrides: PriceDivisorOverrides = {}) {
    const entries = { ...DEFAULT_SEGMENT_DIVISORS, ...overrides.segments };
    for (const [segment, divisor] of Object.entries(entries)) {
      this.divisors.set(Number(segment), assertDivisor(divisor, `segment ${segment}`));
    }
    this.fallback = assertDivisor(overrides.fallback ?? DEFAULT_PRICE_DIVISOR, 'fallback');
  }

  segmentOf(token: InstrumentToken): number {
    return token & 0xff;
  }

  divisorFor(token: InstrumentToken): number {
    return this.divisors.get(this.segmentOf(token)) ?? this.fallback;
  }

  isTradable(token: InstrumentToken): boolean {
    return this.segmentOf(token) !== INDICES_SEGMENT;
  }
}

function assertDivisor(value: number, label: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`Price divisor for ${label} must be a positive number: ${value}`);
  }
  return value;
}
