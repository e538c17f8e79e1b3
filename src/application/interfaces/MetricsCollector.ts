/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * dispatch が何もせずに終わった理由
 */
export type DropReason = 'unknown_type' | 'no_listeners';

/**
 * dispatch 中に回復したエラーの種別
 */
export type DispatchErrorType = 'listener_fault' | 'construction_fault' | 'sink_fault';

/**
 * メトリクス収集インターフェース
 *
 * 責務: メトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * 1 つ以上のリスナーへ配信できたメッセージ数をカウント
   * @param typeName メッセージ種別（tickPrice, error など）
   */
  incrementDispatched(typeName: string): void;

  /**
   * 配信されずに破棄されたイベント数をカウント
   */
  incrementDropped(reason: DropReason): void;

  /**
   * エラー数をカウント
   * @param errorType エラー種別
   * @param typeName メッセージ種別
   */
  incrementError(errorType: DispatchErrorType, typeName: string): void;

  /**
   * 登録中のリスナー数を記録
   */
  setListenerCount(typeName: string, count: number): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーなどで公開する場合に使用）
   */
  getRegistry(): MetricsRegistry;
}
