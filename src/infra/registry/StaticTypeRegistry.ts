import type { TypeRegistry } from '@/application/interfaces/TypeRegistry';
import { defineMessageType } from '@/domain/MessageValue';
import type { FieldShape, MessageType, MessageTypeIdentity } from '@/domain/types';

/**
 * インフラ層: 不変のメッセージ種別カタログ
 *
 * 責務: 起動時に与えられたメッセージ種別を型名で引けるようにする。生成後は変更しない。
 */
export class StaticTypeRegistry implements TypeRegistry {
  private readonly byName: ReadonlyMap<MessageTypeIdentity, MessageType>;
  private readonly all: readonly MessageType[];

  /**
   * @param types メッセージ種別の一覧
   * @throws {Error} 型名が重複している場合
   */
  constructor(types: Iterable<MessageType>) {
    const byName = new Map<MessageTypeIdentity, MessageType>();
    for (const type of types) {
      if (byName.has(type.typeName)) {
        throw new Error(`Duplicate message type: ${type.typeName}`);
      }
      byName.set(type.typeName, type);
    }
    this.byName = byName;
    this.all = Object.freeze([...byName.values()]);
  }

  /**
   * 型名 → フィールド形状 の定義からカタログを作る。
   * @param definitions 型名ごとのフィールド形状（定義順を保持する）
   */
  static fromDefinitions(definitions: Readonly<Record<MessageTypeIdentity, FieldShape>>): StaticTypeRegistry {
    return new StaticTypeRegistry(
      Object.entries(definitions).map(([typeName, fieldShape]) => defineMessageType(typeName, fieldShape))
    );
  }

  get(typeName: MessageTypeIdentity): MessageType | undefined {
    return this.byName.get(typeName);
  }

  types(): readonly MessageType[] {
    return this.all;
  }
}
