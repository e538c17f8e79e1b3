import { config as loadDotenv } from 'dotenv';
import type { LogDestination } from '@/infra/logger/PinoLogger';

/**
 * Receiver の実行時設定
 */
export interface ReceiverConfig {
  /** ログレベル（debug, info, warn, error, silent） */
  logLevel: string;
  /** pino-pretty で人間可読形式にするか（NODE_ENV が production 以外で true） */
  pretty: boolean;
  /** 診断出力先 */
  diagnosticsDestination: LogDestination;
  /** Prometheus メトリクスを収集するか */
  metricsEnabled: boolean;
}

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * 列挙値の環境変数を取得する。未設定なら既定値を返す。
 * @throws {Error} 許可されていない値の場合
 */
function readEnum<T extends string>(env: NodeJS.ProcessEnv, key: string, allowed: readonly T[], fallback: T): T {
  const value = env[key];
  if (value === undefined || value === '') {
    return fallback;
  }
  const matched = allowed.find((candidate) => candidate === value);
  if (matched === undefined) {
    throw new Error(`Invalid value for environment variable ${key}: ${value}`);
  }
  return matched;
}

/**
 * 環境変数から Receiver の設定を読み込む。
 *
 * 環境変数:
 * - `LOG_LEVEL`: ログレベル。デフォルトは `info`
 * - `NODE_ENV`: production の場合は JSON 形式で出力
 * - `RECEIVER_DIAGNOSTICS`: 診断出力先（stderr | stdout）。デフォルトは `stderr`
 * - `RECEIVER_METRICS`: メトリクス収集（true | false）。デフォルトは `false`
 *
 * @param env 環境変数（省略時は `.env` を読み込んだ上で process.env）
 * @throws {Error} 値が不正な場合
 */
export function loadReceiverConfig(env?: NodeJS.ProcessEnv): ReceiverConfig {
  let source = env;
  if (!source) {
    loadDotenv();
    source = process.env;
  }

  const logLevel = readEnum(source, 'LOG_LEVEL', LOG_LEVELS, 'info');
  const diagnostics = readEnum(source, 'RECEIVER_DIAGNOSTICS', ['stderr', 'stdout'], 'stderr');
  const metrics = readEnum(source, 'RECEIVER_METRICS', ['true', 'false'], 'false');

  return {
    logLevel,
    pretty: source.NODE_ENV !== 'production',
    diagnosticsDestination: diagnostics === 'stderr' ? 2 : 1,
    metricsEnabled: metrics === 'true',
  };
}
