import type { MessageType, MessageTypeIdentity } from '@/domain/types';

/**
 * メッセージ種別のカタログ（外部から与えられる読み取り専用の協力者）。
 *
 * 起動時に一度だけ生成され、Receiver より長く生存する。
 */
export interface TypeRegistry {
  /**
   * 型名からメッセージ種別を引く。
   * @param typeName メッセージ種別の識別子
   * @returns 未知の型名の場合は undefined
   */
  get(typeName: MessageTypeIdentity): MessageType | undefined;

  /**
   * 既知のメッセージ種別をすべて列挙する（registerAll / unregisterAll 用）。
   */
  types(): readonly MessageType[];
}
