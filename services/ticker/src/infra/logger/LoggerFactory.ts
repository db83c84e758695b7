import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * プロセス全体で 1 つのルートロガーを共有する。各コンポーネントはここから child() を切り出す。
 *
 * 環境変数:
 * - `LOG_LEVEL`: ログレベル（trace, debug, info, warn, error）。デフォルトは `info`
 * - `LOG_PRETTY`: `true` / `false` で出力形式を強制。未指定なら `NODE_ENV` で判定
 */
class LoggerFactory {
  private static instance: Logger | null = null;

  static create(): Logger {
    if (LoggerFactory.instance === null) {
      const prettyFlag = process.env.LOG_PRETTY;
      const pretty = prettyFlag === undefined ? process.env.NODE_ENV !== 'production' : prettyFlag === 'true';

      LoggerFactory.instance = new PinoLogger({ level: process.env.LOG_LEVEL, pretty });
    }

    return LoggerFactory.instance;
  }
}

export { LoggerFactory };
