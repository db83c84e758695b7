import { ConfigurationError } from '@/domain/errors';
import {
  DEFAULT_SUBSCRIPTION_MODE,
  type InstrumentToken,
  SUBSCRIPTION_MODES,
  type SubscriptionMode,
} from '@/domain/types';

const MAX_INSTRUMENT_TOKEN = 0xffffffff;

/**
 * 再接続時のリプレイでセッションが参照する読み取り専用のビュー
 */
export interface SubscriptionSource {
  groupByMode(): Map<SubscriptionMode, InstrumentToken[]>;
}

/**
 * インフラ層: 購読状態のレジストリ（トークン → モード）
 *
 * 責務: 呼び出し側の subscribe / setMode / unsubscribe を記録し、再接続のたびにリプレイできるようにする。
 * 受信ループからは変更しない。検証に失敗した呼び出しはレジストリを一切変更しない。
 */
export class SubscriptionRegistry implements SubscriptionSource {
  private readonly entries = new Map<InstrumentToken, SubscriptionMode>();

  constructor(private readonly defaultMode: SubscriptionMode = DEFAULT_SUBSCRIPTION_MODE) {
    assertMode(defaultMode);
  }

  /**
   * 未登録のトークンを既定モードで追加する。登録済みのトークンはモードを変えない。
   * @returns 新たに追加されたトークン
   */
  subscribe(tokens: readonly InstrumentToken[]): InstrumentToken[] {
    const unique = normalizeTokens(tokens);
    const added: InstrumentToken[] = [];
    for (const token of unique) {
      if (!this.entries.has(token)) {
        this.entries.set(token, this.defaultMode);
        added.push(token);
      }
    }
    return added;
  }

  /**
   * モードを上書きする（未登録なら暗黙的に購読する）。後勝ち。
   */
  setMode(mode: SubscriptionMode, tokens: readonly InstrumentToken[]): InstrumentToken[] {
    assertMode(mode);
    const unique = normalizeTokens(tokens);
    for (const token of unique) {
      this.entries.set(token, mode);
    }
    return unique;
  }

  /**
   * @returns 実際に削除されたトークン
   */
  unsubscribe(tokens: readonly InstrumentToken[]): InstrumentToken[] {
    const unique = normalizeTokens(tokens);
    return unique.filter((token) => this.entries.delete(token));
  }

  modeOf(token: InstrumentToken): SubscriptionMode | undefined {
    return this.entries.get(token);
  }

  snapshot(): ReadonlyMap<InstrumentToken, SubscriptionMode> {
    return new Map(this.entries);
  }

  /**
   * モードごとにトークンをまとめる。モード 1 つにつき制御メッセージ 1 通で済ませるため。
   */
  groupByMode(): Map<SubscriptionMode, InstrumentToken[]> {
    const groups = new Map<SubscriptionMode, InstrumentToken[]>();
    for (const [token, mode] of this.entries) {
      const group = groups.get(mode);
      if (group) {
        group.push(token);
      } else {
        groups.set(mode, [token]);
      }
    }
    return groups;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export function isSubscriptionMode(value: unknown): value is SubscriptionMode {
  return typeof value === 'string' && SUBSCRIPTION_MODES.some((mode) => mode === value);
}

function assertMode(mode: unknown): asserts mode is SubscriptionMode {
  if (!isSubscriptionMode(mode)) {
    throw new ConfigurationError(`Unknown subscription mode: ${String(mode)}`);
  }
}

/**
 * 全件を検証してから重複を除いた配列を返す。1 件でも不正なら何も返さず throw する。
 */
function normalizeTokens(tokens: readonly InstrumentToken[]): InstrumentToken[] {
  for (const token of tokens) {
    if (!Number.isInteger(token) || token < 0 || token > MAX_INSTRUMENT_TOKEN) {
      throw new ConfigurationError(`Invalid instrument token: ${String(token)}`);
    }
  }
  return [...new Set(tokens)];
}
