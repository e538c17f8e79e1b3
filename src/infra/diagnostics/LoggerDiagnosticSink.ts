import type { DiagnosticSink, DispatchDiagnostic } from '@/application/interfaces/DiagnosticSink';
import type { Logger } from '@/application/interfaces/Logger';

/**
 * インフラ層: ロガーへ書き出す診断出力
 *
 * 責務: リスナー障害・メッセージ生成失敗を、エラー本体（スタックトレース含む）と一緒に記録する。
 * 既定では stderr 向けのロガーを渡して使う。
 */
export class LoggerDiagnosticSink implements DiagnosticSink {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'dispatch' });
  }

  report(diagnostic: DispatchDiagnostic): void {
    switch (diagnostic.kind) {
      case 'listener_fault':
        this.logger.error('Exception in message dispatch. Handler unregistered.', {
          listener: diagnostic.listenerName,
          typeName: diagnostic.typeName,
          err: diagnostic.error,
        });
        return;

      case 'construction_fault':
        this.logger.error('Failed to construct message. Event discarded.', {
          typeName: diagnostic.typeName,
          err: diagnostic.error,
        });
        return;
    }
  }
}
