import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
  /** ルートロガーの name フィールド */
  name?: string;
}

/**
 * ログに出してはいけないフィールド
 */
const REDACT_PATHS = ['accessToken', '*.accessToken', 'apiKey', '*.apiKey'];

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` で人間可読形式、本番環境では JSON 形式で出力する。
 * child() は同じクラスで子ロガーを包むので、ラッパを別に持たない。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options: PinoLoggerOptions | pino.Logger = {}) {
    this.pinoLogger = isPinoInstance(options) ? options : PinoLogger.createRoot(options);
  }

  debug(msg: string, meta: object = {}): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta: object = {}): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta: object = {}): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, meta: object = {}): void {
    this.pinoLogger.error(meta, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }

  private static createRoot(options: PinoLoggerOptions): pino.Logger {
    const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
    const usePretty = options.pretty ?? process.env.NODE_ENV !== 'production';
    const base = {
      level,
      name: options.name ?? 'ticker',
      redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    };

    if (usePretty) {
      return pino({
        ...base,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        },
      });
    }
    return pino(base);
  }
}

function isPinoInstance(value: PinoLoggerOptions | pino.Logger): value is pino.Logger {
  return 'child' in value && typeof value.child === 'function';
}
