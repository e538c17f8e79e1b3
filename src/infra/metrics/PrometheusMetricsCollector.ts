import { Counter, Gauge, Registry } from 'prom-client';
import type {
  DispatchErrorType,
  DropReason,
  MetricsCollector,
  MetricsRegistry,
} from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用して dispatch のメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly dispatchedCounter: Counter;
  private readonly droppedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly listenerGauge: Gauge;

  constructor() {
    this.register = new Registry();

    // 配信メッセージ数カウンター
    this.dispatchedCounter = new Counter({
      name: 'receiver_messages_dispatched_total',
      help: 'Total number of messages delivered to listeners',
      labelNames: ['type'],
      registers: [this.register],
    });

    // 破棄イベント数カウンター（未知の型、リスナー未登録）
    this.droppedCounter = new Counter({
      name: 'receiver_messages_dropped_total',
      help: 'Total number of events dropped without delivery',
      labelNames: ['reason'],
      registers: [this.register],
    });

    // エラー数カウンター
    this.errorCounter = new Counter({
      name: 'receiver_errors_total',
      help: 'Total number of errors recovered during dispatch',
      labelNames: ['error_type', 'type'],
      registers: [this.register],
    });

    // 登録中リスナー数ゲージ
    this.listenerGauge = new Gauge({
      name: 'receiver_listeners',
      help: 'Number of listeners currently registered per message type',
      labelNames: ['type'],
      registers: [this.register],
    });
  }

  incrementDispatched(typeName: string): void {
    this.dispatchedCounter.inc({ type: typeName });
  }

  incrementDropped(reason: DropReason): void {
    this.droppedCounter.inc({ reason });
  }

  incrementError(errorType: DispatchErrorType, typeName: string): void {
    this.errorCounter.inc({ error_type: errorType, type: typeName });
  }

  setListenerCount(typeName: string, count: number): void {
    this.listenerGauge.set({ type: typeName }, count);
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
