import type { MessageTypeIdentity } from '@/domain/types';

/**
 * ディスパッチテーブルの検索キーを生成する。
 * 型名を持つオブジェクトならその型名、それ以外は文字列表現を返す。
 * 型名の文字列とメッセージ種別オブジェクトは同じキーになる。
 * @param obj 型名の文字列、メッセージ種別、またはその他の値
 */
export function messageKey(obj: unknown): MessageTypeIdentity {
  if ((typeof obj === 'object' || typeof obj === 'function') && obj !== null && 'typeName' in obj) {
    if (typeof obj.typeName === 'string') {
      return obj.typeName;
    }
  }
  return String(obj);
}
