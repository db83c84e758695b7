import { ProtocolError } from '@/domain/errors';
import type { DepthLevel, FullTick, IndexTick, LtpTick, Ohlc, QuoteTick, Tick } from '@/domain/types';
import { PriceDivisorTable } from './PriceDivisorTable';

/**
 * パケット長ごとのレイアウト。長さでモードが決まる。
 */
export const PACKET_LENGTH = {
  LTP: 8,
  INDEX_QUOTE: 28,
  INDEX_FULL: 32,
  QUOTE: 44,
  FULL: 184,
} as const;

const DEPTH_OFFSET = 64;
const DEPTH_ENTRY_SIZE = 12;
const DEPTH_LEVELS_PER_SIDE = 5;

/**
 * 1 パケットのデコード結果。
 * 未知の長さのパケットは LTP フィールドだけを読み、partial として返す。
 */
export type PacketDecodeResult =
  | { status: 'complete'; tick: Tick }
  | { status: 'partial'; tick: LtpTick; packetLength: number };

export type FrameDecodeResult = { kind: 'heartbeat' } | { kind: 'ticks'; packets: PacketDecodeResult[] };

/**
 * インフラ層: バイナリフレームのデコーダ（純粋関数的、状態を持たない）
 *
 * フレーム形式: [パケット数 uint16BE] + ([パケット長 uint16BE] + [パケット本体]) * パケット数
 * 数値はすべてビッグエンディアン。価格はセグメントの除数で割る。
 */
export class BinaryTickDecoder {
  constructor(private readonly divisors: PriceDivisorTable = new PriceDivisorTable()) {}

  /**
   * @throws {ProtocolError} 宣言された長さにフレームが足りない場合
   */
  decode(frame: Buffer): FrameDecodeResult {
    // 1 バイトのフレームはサーバーのハートビート
    if (frame.length < 2) {
      return { kind: 'heartbeat' };
    }

    const packetCount = frame.readUInt16BE(0);
    const packets: PacketDecodeResult[] = [];
    let offset = 2;

    for (let i = 0; i < packetCount; i++) {
      if (offset + 2 > frame.length) {
        throw new ProtocolError(`Frame truncated: missing length header for packet ${i + 1} of ${packetCount}`);
      }
      const packetLength = frame.readUInt16BE(offset);
      offset += 2;

      if (offset + packetLength > frame.length) {
        throw new ProtocolError(
          `Frame truncated: packet ${i + 1} declares ${packetLength} bytes but ${frame.length - offset} remain`
        );
      }
      packets.push(this.decodePacket(frame.subarray(offset, offset + packetLength)));
      offset += packetLength;
    }

    return { kind: 'ticks', packets };
  }

  /**
   * @throws {ProtocolError} LTP フィールドすら読めない短いパケットの場合
   */
  decodePacket(packet: Buffer): PacketDecodeResult {
    if (packet.length < PACKET_LENGTH.LTP) {
      throw new ProtocolError(`Packet of ${packet.length} bytes is shorter than the LTP layout`);
    }

    switch (packet.length) {
      case PACKET_LENGTH.LTP:
        return { status: 'complete', tick: this.readLtp(packet) };
      case PACKET_LENGTH.INDEX_QUOTE:
      case PACKET_LENGTH.INDEX_FULL:
        return { status: 'complete', tick: this.readIndex(packet) };
      case PACKET_LENGTH.QUOTE:
        return { status: 'complete', tick: this.readQuote(packet) };
      case PACKET_LENGTH.FULL:
        return { status: 'complete', tick: this.readFull(packet) };
      default:
        // 後方にフィールドが追加されても落とさない。既知のプレフィックスだけ読む
        return { status: 'partial', tick: this.readLtp(packet), packetLength: packet.length };
    }
  }

  private readLtp(packet: Buffer): LtpTick {
    const instrumentToken = packet.readUInt32BE(0);
    return {
      kind: 'ltp',
      mode: 'ltp',
      instrumentToken,
      tradable: this.divisors.isTradable(instrumentToken),
      lastPrice: packet.readUInt32BE(4) / this.divisors.divisorFor(instrumentToken),
    };
  }

  private readIndex(packet: Buffer): IndexTick {
    const instrumentToken = packet.readUInt32BE(0);
    const price = this.priceReader(packet, instrumentToken);
    const lastPrice = price(4);
    // インデックスは high, low, open, close の順
    const ohlc: Ohlc = { high: price(8), low: price(12), open: price(16), close: price(20) };

    const tick: IndexTick = {
      kind: 'index',
      mode: packet.length === PACKET_LENGTH.INDEX_FULL ? 'full' : 'quote',
      instrumentToken,
      tradable: this.divisors.isTradable(instrumentToken),
      lastPrice,
      ohlc,
      change: changePercent(lastPrice, ohlc.close),
    };
    if (packet.length === PACKET_LENGTH.INDEX_FULL) {
      tick.exchangeTimestamp = readEpochSeconds(packet, 28);
    }
    return tick;
  }

  private readQuote(packet: Buffer): QuoteTick {
    const instrumentToken = packet.readUInt32BE(0);
    const price = this.priceReader(packet, instrumentToken);
    const lastPrice = price(4);
    const ohlc: Ohlc = { open: price(28), high: price(32), low: price(36), close: price(40) };

    return {
      kind: 'quote',
      mode: 'quote',
      instrumentToken,
      tradable: this.divisors.isTradable(instrumentToken),
      lastPrice,
      lastTradedQuantity: packet.readUInt32BE(8),
      averageTradedPrice: price(12),
      volumeTraded: packet.readUInt32BE(16),
      totalBuyQuantity: packet.readUInt32BE(20),
      totalSellQuantity: packet.readUInt32BE(24),
      ohlc,
      change: changePercent(lastPrice, ohlc.close),
    };
  }

  private readFull(packet: Buffer): FullTick {
    const { kind: _kind, mode: _mode, ...quote } = this.readQuote(packet);
    const price = this.priceReader(packet, quote.instrumentToken);

    const buy: DepthLevel[] = [];
    const sell: DepthLevel[] = [];
    for (let level = 0; level < DEPTH_LEVELS_PER_SIDE * 2; level++) {
      const offset = DEPTH_OFFSET + level * DEPTH_ENTRY_SIZE;
      const entry: DepthLevel = {
        quantity: packet.readUInt32BE(offset),
        price: price(offset + 4),
        orders: packet.readUInt16BE(offset + 8),
      };
      (level < DEPTH_LEVELS_PER_SIDE ? buy : sell).push(entry);
    }

    return {
      ...quote,
      kind: 'full',
      mode: 'full',
      lastTradeTime: readEpochSeconds(packet, 44),
      openInterest: packet.readUInt32BE(48),
      openInterestDayHigh: packet.readUInt32BE(52),
      openInterestDayLow: packet.readUInt32BE(56),
      exchangeTimestamp: readEpochSeconds(packet, 60),
      depth: { buy, sell },
    };
  }

  private priceReader(packet: Buffer, token: number): (offset: number) => number {
    const divisor = this.divisors.divisorFor(token);
    return (offset) => packet.readUInt32BE(offset) / divisor;
  }
}

function changePercent(lastPrice: number, close: number): number {
  return close === 0 ? 0 : ((lastPrice - close) * 100) / close;
}

function readEpochSeconds(packet: Buffer, offset: number): Date {
  return new Date(packet.readUInt32BE(offset) * 1000);
}
