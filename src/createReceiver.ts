import type { DiagnosticSink } from '@/application/interfaces/DiagnosticSink';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TypeRegistry } from '@/application/interfaces/TypeRegistry';
import { Receiver } from '@/application/receiver/Receiver';
import { loadReceiverConfig, type ReceiverConfig } from '@/config/ReceiverConfig';
import type { Listener, MessageTypeRef } from '@/domain/types';
import { loadDefaultCatalog } from '@/infra/catalog/loadCatalog';
import { LoggerDiagnosticSink } from '@/infra/diagnostics/LoggerDiagnosticSink';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';

export interface CreateReceiverOptions {
  /** メッセージ種別カタログ。省略時は既定カタログ */
  types?: TypeRegistry;
  /** 省略時は環境変数から読み込む */
  config?: ReceiverConfig;
  logger?: Logger;
  diagnosticSink?: DiagnosticSink;
  metricsCollector?: MetricsCollector;
  listeners?: Iterable<readonly [MessageTypeRef, Iterable<Listener>]>;
}

/**
 * Receiver を依存関係ごと組み立てる。
 *
 * 注意: ここでは配線だけを行い、dispatch の挙動は Receiver に閉じ込める。
 */
export function createReceiver(options: CreateReceiverOptions = {}): Receiver {
  const config = options.config ?? loadReceiverConfig();

  const settings = { level: config.logLevel, pretty: config.pretty };
  const logger = options.logger ?? LoggerFactory.create(1, settings);
  const diagnosticSink =
    options.diagnosticSink ??
    new LoggerDiagnosticSink(LoggerFactory.create(config.diagnosticsDestination, settings));
  const metricsCollector =
    options.metricsCollector ?? (config.metricsEnabled ? new PrometheusMetricsCollector() : undefined);

  const types = options.types ?? loadDefaultCatalog();
  logger.debug('receiver created', { types: types.types().length, metrics: metricsCollector !== undefined });

  return new Receiver(types, {
    logger,
    diagnosticSink,
    metricsCollector,
    listeners: options.listeners,
  });
}
