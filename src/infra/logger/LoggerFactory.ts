import type { Logger } from '@/application/interfaces/Logger';
import { type LogDestination, PinoLogger } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * 環境変数に基づいてロガーインスタンスを生成する。
 * 出力先・ログレベル・出力形式の組ごとにシングルトンとし、同じ設定では同じロガーインスタンスを使用する。
 */
class LoggerFactory {
  private static readonly instances = new Map<string, Logger>();

  /**
   * ロガーインスタンスを取得または作成
   *
   * 環境変数:
   * - `LOG_LEVEL`: ログレベル（debug, info, warn, error, silent）。デフォルトは `info`
   * - `NODE_ENV`: 環境（production の場合は JSON 形式、それ以外は pretty 形式）
   *
   * `settings` を渡した場合は環境変数より優先する。
   *
   * @param destination 出力先（1: stdout, 2: stderr）。デフォルトは stdout
   * @param settings ログレベル・pretty 出力の指定
   */
  static create(destination: LogDestination = 1, settings?: { level?: string; pretty?: boolean }): Logger {
    const level = settings?.level ?? process.env.LOG_LEVEL ?? 'info';
    const pretty = settings?.pretty ?? process.env.NODE_ENV !== 'production';
    const key = `${destination}:${level}:${pretty}`;

    let instance = LoggerFactory.instances.get(key);
    if (!instance) {
      instance = new PinoLogger({ level, pretty, destination });
      LoggerFactory.instances.set(key, instance);
    }

    return instance;
  }

  /**
   * ロガーインスタンスをリセット（主にテスト用）
   */
  static reset(): void {
    LoggerFactory.instances.clear();
  }
}

export { LoggerFactory };
