import type { InstrumentToken, OrderUpdate, SubscriptionMode } from '@/domain/types';

/**
 * サーバーへ送信する制御コマンドの型定義。
 */
export type ControlCommand =
  | { a: 'subscribe'; v: InstrumentToken[] }
  | { a: 'unsubscribe'; v: InstrumentToken[] }
  | { a: 'mode'; v: [SubscriptionMode, InstrumentToken[]] };

/**
 * サーバーから受信するテキストフレームのデコード結果。
 */
export type ControlMessage =
  | { type: 'order'; data: OrderUpdate }
  | { type: 'error'; message: string }
  | { type: 'ack'; messageType: string; data: unknown };

