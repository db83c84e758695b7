/**
 * ドメイン層: ティッカーで扱う値の型定義（DTO 的な型のみ）
 *
 * 注意: 振る舞いは持たない。デコードや購読管理はインフラ層が担当する。
 */

/**
 * 銘柄トークン（符号なし 32bit 整数）。下位 8bit がマーケットセグメントを表す。
 */
export type InstrumentToken = number;

/**
 * 購読モード。ltp < quote < full の順にペイロードが大きくなる。
 */
export type SubscriptionMode = 'ltp' | 'quote' | 'full';

export const SUBSCRIPTION_MODES: readonly SubscriptionMode[] = ['ltp', 'quote', 'full'];

/** subscribe() で追加されたトークンに付与されるモード */
export const DEFAULT_SUBSCRIPTION_MODE: SubscriptionMode = 'quote';

/**
 * クライアントの接続状態。closed は stop() もしくはリトライ上限到達でのみ遷移する終端状態。
 */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'closed';

/**
 * セッション終了理由。
 * - clean: 呼び出し側の close、またはサーバーからの正常終了（1000）
 * - error: 通信エラー、ハンドシェイク失敗、異常終了コード
 * - timeout: ハートビート途絶、ハンドシェイクのタイムアウト
 */
export type CloseReason = 'clean' | 'error' | 'timeout';

export interface Ohlc {
  open: number;
  high: number;
  low: number;
  close: number;
}

/** 板情報の 1 レベル */
export interface DepthLevel {
  quantity: number;
  price: number;
  orders: number;
}

export interface MarketDepth {
  buy: DepthLevel[];
  sell: DepthLevel[];
}

interface TickBase {
  instrumentToken: InstrumentToken;
  /** インデックスセグメント以外は true */
  tradable: boolean;
  mode: SubscriptionMode;
  lastPrice: number;
}

/** 8 バイトパケット、または未知の長さのパケットの既知プレフィックス */
export interface LtpTick extends TickBase {
  kind: 'ltp';
  mode: 'ltp';
}

/** インデックスのパケット（quote: 28 バイト / full: 32 バイト） */
export interface IndexTick extends TickBase {
  kind: 'index';
  mode: 'quote' | 'full';
  ohlc: Ohlc;
  /** 前日終値からの変化率（%） */
  change: number;
  exchangeTimestamp?: Date;
}

/** 44 バイトパケット */
export interface QuoteTick extends TickBase {
  kind: 'quote';
  mode: 'quote';
  lastTradedQuantity: number;
  averageTradedPrice: number;
  volumeTraded: number;
  totalBuyQuantity: number;
  totalSellQuantity: number;
  ohlc: Ohlc;
  change: number;
}

/** 184 バイトパケット（5 レベルの板情報付き） */
export interface FullTick extends Omit<QuoteTick, 'kind' | 'mode'> {
  kind: 'full';
  mode: 'full';
  lastTradeTime: Date;
  openInterest: number;
  openInterestDayHigh: number;
  openInterestDayLow: number;
  exchangeTimestamp: Date;
  depth: MarketDepth;
}

export type Tick = LtpTick | IndexTick | QuoteTick | FullTick;

/**
 * 注文更新のペイロード。サーバーから受け取った JSON オブジェクトをそのまま保持する。
 */
export type OrderUpdate = Record<string, unknown>;

/**
 * order / error 以外のテキストメッセージ（サーバーからの通知）
 */
export interface ServerNotice {
  type: string;
  data: unknown;
}

/** 既知の長さに一致しなかったパケットの通知 */
export interface PartialPacketEvent {
  instrumentToken: InstrumentToken;
  packetLength: number;
}

export interface CloseEvent {
  reason: CloseReason;
  /** WebSocket のクローズコード（ソケットが閉じる前に終了した場合は undefined） */
  code?: number;
}

export interface ReconnectEvent {
  /** 1 始まりの試行番号 */
  attempt: number;
  delayMs: number;
}
