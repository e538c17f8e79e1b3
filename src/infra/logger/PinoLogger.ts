import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

/**
 * 出力先のファイルディスクリプタ（1: stdout, 2: stderr）
 */
export type LogDestination = 1 | 2;

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
  destination?: LogDestination;
  /** 既存の pino インスタンスをラップする場合に指定（子ロガー・テスト用） */
  instance?: pino.Logger;
}

function createPinoInstance(options: PinoLoggerOptions): pino.Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const destination = options.destination ?? 1;
  // 開発環境では pino-pretty を使用（pretty オプションが明示的に false でない場合）
  const usePretty = options.pretty ?? process.env.NODE_ENV !== 'production';

  if (usePretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination,
        },
      },
    });
  }

  // 本番環境: JSON 形式で出力
  return pino({ level }, pino.destination(destination));
}

/**
 * pino を使用したロガー実装
 *
 * 環境変数 `LOG_LEVEL` でログレベルを制御。
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options: PinoLoggerOptions = {}) {
    this.pinoLogger = options.instance ?? createPinoInstance(options);
  }

  /** 現在のログレベル */
  get level(): string {
    return this.pinoLogger.level;
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger({ instance: this.pinoLogger.child(bindings) });
  }
}
