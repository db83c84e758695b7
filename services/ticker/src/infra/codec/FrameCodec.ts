import type { InstrumentToken, SubscriptionMode } from '@/domain/types';
import { BinaryTickDecoder, type FrameDecodeResult } from './BinaryTickDecoder';
import { ControlMessageCodec } from './ControlMessageCodec';
import type { ControlMessage } from './messages/ControlMessage';
import { type PriceDivisorOverrides, PriceDivisorTable } from './PriceDivisorTable';

/**
 * インフラ層: ワイヤプロトコルの窓口
 *
 * バイナリ（ティック）とテキスト（制御メッセージ）の両方をまとめて扱う。I/O は持たない。
 */
export class FrameCodec {
  private readonly binary: BinaryTickDecoder;
  private readonly control = new ControlMessageCodec();

  constructor(divisors: PriceDivisorOverrides | PriceDivisorTable = {}) {
    const table = divisors instanceof PriceDivisorTable ? divisors : new PriceDivisorTable(divisors);
    this.binary = new BinaryTickDecoder(table);
  }

  decodeBinary(frame: Buffer): FrameDecodeResult {
    return this.binary.decode(frame);
  }

  decodeText(text: string): ControlMessage {
    return this.control.decode(text);
  }

  encodeSubscribe(tokens: readonly InstrumentToken[]): string {
    return this.control.encodeSubscribe(tokens);
  }

  encodeUnsubscribe(tokens: readonly InstrumentToken[]): string {
    return this.control.encodeUnsubscribe(tokens);
  }

  encodeSetMode(mode: SubscriptionMode, tokens: readonly InstrumentToken[]): string {
    return this.control.encodeSetMode(mode, tokens);
  }
}
