import type { TickerError } from './errors';
import type {
  CloseEvent,
  OrderUpdate,
  PartialPacketEvent,
  ReconnectEvent,
  ServerNotice,
  Tick,
} from './types';

/**
 * TickerClient が発行するイベントと、ハンドラに渡される引数
 */
export interface TickerEventMap {
  /** 1 フレーム分のティック（ワイヤ上の順序） */
  tick: [ticks: Tick[]];
  connect: [];
  close: [event: CloseEvent];
  error: [error: TickerError];
  reconnect: [event: ReconnectEvent];
  orderUpdate: [update: OrderUpdate];
  partial: [event: PartialPacketEvent];
  message: [notice: ServerNotice];
}

export type TickerEventKind = keyof TickerEventMap;
