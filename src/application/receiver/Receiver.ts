import type { DiagnosticSink, DispatchDiagnostic } from '@/application/interfaces/DiagnosticSink';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TypeRegistry } from '@/application/interfaces/TypeRegistry';
import type {
  EntryPoint,
  FieldMapping,
  Listener,
  MessageType,
  MessageTypeIdentity,
  MessageTypeRef,
  MessageValue,
} from '@/domain/types';
import { buildEntryPoints } from './entryPoints';
import { ERROR_TYPE, resolveErrorCall } from './ErrorDispatchAdapter';
import { messageKey } from './messageKey';

/**
 * Receiver の依存関係
 */
export interface ReceiverDependencies {
  logger: Logger;
  /** リスナー障害の報告先 */
  diagnosticSink: DiagnosticSink;
  metricsCollector?: MetricsCollector;
  /** 初期登録するリスナー（型ごと） */
  listeners?: Iterable<readonly [MessageTypeRef, Iterable<Listener>]>;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function describeListener(listener: Listener): string {
  return listener.name ? `[Function: ${listener.name}]` : '[Function: anonymous]';
}

/**
 * アプリケーション層: 受信メッセージのディスパッチャ
 *
 * 責務: 生イベント（型名 + フィールド）からメッセージ値を生成し、登録済みリスナーへ配信する。
 * - 型ごとのリスナー一覧（ディスパッチテーブル）の管理
 * - 配信中に例外を投げたリスナーはその型から登録解除し、診断出力へ報告する
 * - dispatch は呼び出し元へ例外を伝播させない
 *
 * 注意: 配信は同期的に行う。Node.js のイベントループ上で動くため排他制御は持たない。
 */
export class Receiver {
  /**
   * 型ごとの入口関数。カタログの全型と `error` を持つ。
   */
  readonly entryPoints: ReadonlyMap<MessageTypeIdentity, EntryPoint>;

  private readonly listeners = new Map<MessageTypeIdentity, Listener[]>();
  private readonly logger: Logger;
  private readonly diagnosticSink: DiagnosticSink;
  private readonly metricsCollector?: MetricsCollector;

  /**
   * @param types メッセージ種別のカタログ（読み取り専用）
   * @param dependencies ロガー・診断出力先など
   */
  constructor(
    private readonly types: TypeRegistry,
    dependencies: ReceiverDependencies
  ) {
    this.logger = dependencies.logger.child({ component: 'Receiver' });
    this.diagnosticSink = dependencies.diagnosticSink;
    this.metricsCollector = dependencies.metricsCollector;

    for (const [type, listeners] of dependencies.listeners ?? []) {
      for (const listener of listeners) {
        this.register(listener, type);
      }
    }

    this.entryPoints = buildEntryPoints(this.types, (typeName, fields) => this.dispatch(typeName, fields), {
      [ERROR_TYPE]: (...args: unknown[]) => this.error(...args),
    });
  }

  /**
   * ディスパッチテーブルの検索キーを生成する。
   * @param obj 型名の文字列、またはメッセージ種別
   */
  static key(obj: unknown): MessageTypeIdentity {
    return messageKey(obj);
  }

  /**
   * リスナーを指定した型に登録する。登録済みなら何もしない。
   * @param listener メッセージを受け取る関数
   * @param types 登録先の型（0 個以上）
   */
  register(listener: Listener, ...types: MessageTypeRef[]): void {
    for (const type of types) {
      const key = Receiver.key(type);
      let registered = this.listeners.get(key);
      if (!registered) {
        registered = [];
        this.listeners.set(key, registered);
      }
      if (!registered.includes(listener)) {
        registered.push(listener);
        this.metricsCollector?.setListenerCount(key, registered.length);
      }
    }
  }

  /**
   * リスナーをカタログの全型に登録する。
   */
  registerAll(listener: Listener): void {
    this.register(listener, ...this.types.types());
  }

  /**
   * リスナーを指定した型から登録解除する。未登録の場合は何もしない。
   * @param listener 登録解除するリスナー
   * @param types 解除対象の型（0 個以上）
   */
  unregister(listener: Listener, ...types: MessageTypeRef[]): void {
    for (const type of types) {
      const key = Receiver.key(type);
      const registered = this.listeners.get(key);
      if (!registered) {
        continue;
      }
      const index = registered.indexOf(listener);
      if (index === -1) {
        continue;
      }
      registered.splice(index, 1);
      if (registered.length === 0) {
        this.listeners.delete(key);
      }
      this.metricsCollector?.setListenerCount(key, registered.length);
    }
  }

  /**
   * リスナーをカタログの全型から登録解除する。
   */
  unregisterAll(listener: Listener): void {
    this.unregister(listener, ...this.types.types());
  }

  /**
   * 指定した型に登録されているリスナーを登録順で返す（複製）。
   */
  listenersOf(type: MessageTypeRef): readonly Listener[] {
    return [...(this.listeners.get(Receiver.key(type)) ?? [])];
  }

  /**
   * メッセージ値を生成し、その型の全リスナーへ配信する。
   *
   * - 未知の型名、またはリスナー未登録の型の場合は何もしない
   * - 配信開始時点のリスナー一覧を複製してから反復する
   * - 例外を投げたリスナーはこの型からのみ登録解除し、残りのリスナーへの配信を続ける
   *
   * @param name 型名の文字列、またはメッセージ種別
   * @param fields フィールド値
   */
  dispatch(name: MessageTypeRef, fields: FieldMapping): void {
    const type = this.types.get(Receiver.key(name));
    if (!type) {
      this.metricsCollector?.incrementDropped('unknown_type');
      return;
    }

    const typeName = Receiver.key(type);
    const registered = this.listeners.get(typeName);
    if (!registered || registered.length === 0) {
      this.metricsCollector?.incrementDropped('no_listeners');
      return;
    }

    let message: MessageValue;
    try {
      message = type.create(fields);
    } catch (error) {
      this.metricsCollector?.incrementError('construction_fault', typeName);
      this.report({ kind: 'construction_fault', typeName, error });
      return;
    }

    let delivered = 0;
    for (const listener of [...registered]) {
      if (this.deliver(listener, type, message)) {
        delivered++;
      }
    }
    // 全リスナーが同期的に失敗した場合は配信数に含めない
    if (delivered > 0) {
      this.metricsCollector?.incrementDispatched(typeName);
    }
  }

  /**
   * エラーイベントを正規化して dispatch へ転送する。
   * `error(value)`、`error(text)`、`error(id, errorCode, errorMsg)` のいずれの形でも呼べる。
   */
  error(...args: unknown[]): void {
    const call = resolveErrorCall(args);
    this.dispatch(ERROR_TYPE, call.fields);
  }

  /**
   * トランスポートから受け取った `(メソッド名, 位置引数)` を対応する入口関数へ渡す。
   * 未知のメソッド名は無視する。
   */
  receive(methodName: string, args: readonly unknown[]): void {
    const entryPoint = this.entryPoints.get(methodName);
    if (!entryPoint) {
      this.metricsCollector?.incrementDropped('unknown_type');
      return;
    }
    entryPoint(...args);
  }

  /**
   * リスナーを 1 つ呼び出す。同期的に例外を投げなければ true を返す。
   * Promise の失敗は dispatch の後で障害として扱う。
   */
  private deliver(listener: Listener, type: MessageType, message: MessageValue): boolean {
    try {
      const result: unknown = listener(message);
      if (isPromiseLike(result)) {
        void result.then(undefined, (error: unknown) => this.handleAsyncListenerFault(listener, type, error));
      }
      return true;
    } catch (error) {
      this.handleListenerFault(listener, type, error);
      return false;
    }
  }

  private handleAsyncListenerFault(listener: Listener, type: MessageType, error: unknown): void {
    try {
      this.handleListenerFault(listener, type, error);
    } catch (faultError) {
      this.logger.error('Failed to handle listener fault', { typeName: type.typeName, err: faultError });
    }
  }

  private handleListenerFault(listener: Listener, type: MessageType, error: unknown): void {
    this.unregister(listener, type);
    this.metricsCollector?.incrementError('listener_fault', type.typeName);
    this.report({
      kind: 'listener_fault',
      listener,
      listenerName: describeListener(listener),
      typeName: type.typeName,
      error,
    });
  }

  private report(diagnostic: DispatchDiagnostic): void {
    try {
      this.diagnosticSink.report(diagnostic);
    } catch (sinkError) {
      this.metricsCollector?.incrementError('sink_fault', diagnostic.typeName);
      this.logger.error('Diagnostic sink failed', { typeName: diagnostic.typeName, err: sinkError });
    }
  }
}
