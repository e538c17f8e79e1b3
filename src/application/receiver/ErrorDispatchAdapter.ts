/**
 * エラーイベントのメッセージ種別名
 */
export const ERROR_TYPE = 'error';

/**
 * 正規化済みのエラー呼び出し。
 * 旧来の 3 種類の呼び出し形状を、どの形状から来たかのタグ付きで表す。
 */
export type ErrorCall =
  | { shape: 'coded'; fields: { id: number; errorCode: number; errorMsg: string } }
  | { shape: 'text'; fields: { errorMsg: string } }
  | { shape: 'opaque'; fields: { errorMsg: unknown } };

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * エラーイベントの引数を正規のフィールドへ変換する。
 *
 * 判定は次の優先順で行う:
 * 1. `(id: 整数, errorCode: 整数, errorMsg: 文字列)` → id, errorCode, errorMsg
 * 2. 文字列 1 つ → errorMsg
 * 3. 任意の値 1 つ → errorMsg
 * 4. どれにも当てはまらない場合は引数の組全体を errorMsg とする（例外は投げない）
 *
 * @param args エラーイベントの位置引数
 */
export function resolveErrorCall(args: readonly unknown[]): ErrorCall {
  const [first, second, third] = args;

  if (args.length === 3 && isInteger(first) && isInteger(second) && typeof third === 'string') {
    return { shape: 'coded', fields: { id: first, errorCode: second, errorMsg: third } };
  }

  if (args.length === 1) {
    if (typeof first === 'string') {
      return { shape: 'text', fields: { errorMsg: first } };
    }
    return { shape: 'opaque', fields: { errorMsg: first } };
  }

  return { shape: 'opaque', fields: { errorMsg: [...args] } };
}
