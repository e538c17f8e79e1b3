/**
 * メッセージ値の生成に失敗したことを表すエラー。
 * FieldShape に存在しないフィールドが渡された場合に投げられる。
 */
export class MessageConstructionError extends Error {
  override readonly name = 'MessageConstructionError';

  constructor(
    readonly typeName: string,
    readonly unexpectedFields: readonly string[]
  ) {
    super(`Unexpected fields for message type ${typeName}: ${unexpectedFields.join(', ')}`);
  }
}
