import { describe, expect, it } from 'vitest';
import { loadReceiverConfig } from '@/config/ReceiverConfig';

/**
 * 単体テスト: loadReceiverConfig
 */
describe('loadReceiverConfig', () => {
  it('未設定の場合は既定値を使う', () => {
    expect(loadReceiverConfig({})).toEqual({
      logLevel: 'info',
      pretty: true,
      diagnosticsDestination: 2,
      metricsEnabled: false,
    });
  });

  it('環境変数の値を反映する', () => {
    const config = loadReceiverConfig({
      LOG_LEVEL: 'debug',
      NODE_ENV: 'production',
      RECEIVER_DIAGNOSTICS: 'stdout',
      RECEIVER_METRICS: 'true',
    });

    expect(config).toEqual({
      logLevel: 'debug',
      pretty: false,
      diagnosticsDestination: 1,
      metricsEnabled: true,
    });
  });

  it('空文字は未設定として扱う', () => {
    expect(loadReceiverConfig({ LOG_LEVEL: '' }).logLevel).toBe('info');
  });

  it('不正なログレベルはエラーを投げる', () => {
    expect(() => loadReceiverConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      'Invalid value for environment variable LOG_LEVEL: verbose'
    );
  });

  it('不正な診断出力先はエラーを投げる', () => {
    expect(() => loadReceiverConfig({ RECEIVER_DIAGNOSTICS: 'file' })).toThrow(
      'Invalid value for environment variable RECEIVER_DIAGNOSTICS: file'
    );
  });

  it('不正なメトリクス指定はエラーを投げる', () => {
    expect(() => loadReceiverConfig({ RECEIVER_METRICS: 'yes' })).toThrow(
      'Invalid value for environment variable RECEIVER_METRICS: yes'
    );
  });
});
