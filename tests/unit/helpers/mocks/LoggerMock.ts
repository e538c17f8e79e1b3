import { type Mock, vi } from 'vitest';
import type { Logger } from '@/application/interfaces/Logger';

type LogMethod = (msg: string, meta?: object) => void;

/**
 * テスト用ロガーモック
 *
 * vitest の vi.fn() を使用して、ロガーメソッドの呼び出しを記録・検証できるようにする。
 * child() は自分自身を返すため、子ロガー経由の出力も同じモックで検証できる。
 */
export class LoggerMock implements Logger {
  debug: Mock<LogMethod> = vi.fn<LogMethod>();
  info: Mock<LogMethod> = vi.fn<LogMethod>();
  warn: Mock<LogMethod> = vi.fn<LogMethod>();
  error: Mock<LogMethod> = vi.fn<LogMethod>();
  child: Mock<(bindings: object) => Logger> = vi.fn<(bindings: object) => Logger>(() => this);
}
