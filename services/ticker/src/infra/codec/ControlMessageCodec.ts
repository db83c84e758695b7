import { ProtocolError } from '@/domain/errors';
import type { InstrumentToken, SubscriptionMode } from '@/domain/types';
import type { ControlCommand, ControlMessage } from './messages/ControlMessage';

/**
 * インフラ層: JSON テキストフレームのエンコード・デコード
 *
 * 送信: subscribe / unsubscribe / mode コマンド
 * 受信: order（注文更新）、error（サーバーエラー）、それ以外は ack として扱う
 */
export class ControlMessageCodec {
  encodeSubscribe(tokens: readonly InstrumentToken[]): string {
    return this.encode({ a: 'subscribe', v: [...tokens] });
  }

  encodeUnsubscribe(tokens: readonly InstrumentToken[]): string {
    return this.encode({ a: 'unsubscribe', v: [...tokens] });
  }

  encodeSetMode(mode: SubscriptionMode, tokens: readonly InstrumentToken[]): string {
    return this.encode({ a: 'mode', v: [mode, [...tokens]] });
  }

  /**
   * @throws {ProtocolError} JSON として解釈できない、または type を持たない場合
   */
  decode(text: string): ControlMessage {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ProtocolError('Text frame is not valid JSON', { cause: error });
    }

    if (!isRecord(parsed) || typeof parsed.type !== 'string') {
      throw new ProtocolError('Text frame has no message type');
    }
    const messageType: string = parsed.type;

    switch (messageType) {
      case 'order':
        if (!isRecord(parsed.data)) {
          throw new ProtocolError('Order update without an object payload');
        }
        return { type: 'order', data: parsed.data };
      case 'error':
        return { type: 'error', message: typeof parsed.data === 'string' ? parsed.data : JSON.stringify(parsed.data) };
      default:
        return { type: 'ack', messageType, data: parsed.data };
    }
  }

  private encode(command: ControlCommand): string {
    return JSON.stringify(command);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

