import type { Listener } from '@/domain/types';

/**
 * リスナーが例外を投げ、その型から登録解除されたことを表す診断情報。
 */
export interface ListenerFaultDiagnostic {
  kind: 'listener_fault';
  /** 障害を起こしたリスナー */
  listener: Listener;
  /** ログ出力用のリスナー識別名 */
  listenerName: string;
  /** 配信中だったメッセージ種別 */
  typeName: string;
  /** 投げられた値（Error ならスタックトレースを含む） */
  error: unknown;
}

/**
 * メッセージ値の生成に失敗したことを表す診断情報。
 */
export interface ConstructionFaultDiagnostic {
  kind: 'construction_fault';
  typeName: string;
  error: unknown;
}

export type DispatchDiagnostic = ListenerFaultDiagnostic | ConstructionFaultDiagnostic;

/**
 * 診断出力先のインターフェース（インフラ層で実装される）。
 *
 * dispatch の呼び出し元へ例外を伝播させる代わりに、ここへ報告する。
 */
export interface DiagnosticSink {
  report(diagnostic: DispatchDiagnostic): void;
}
