import { MessageConstructionError } from './errors';
import type { FieldMapping, FieldShape, MessageType, MessageTypeIdentity, MessageValue } from './types';

/**
 * 値を `<typeName field=value>` 表記用の文字列に変換する。
 */
function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  if (value === null || value === undefined || typeof value !== 'object') {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    // 循環参照など JSON 化できない値はそのまま文字列化する
    return String(value);
  }
}

/**
 * フィールド形状に従ってメッセージ値を生成する。
 *
 * - FieldShape にあるが mapping にないフィールドは null で補う
 * - FieldShape にないフィールドが含まれる場合は MessageConstructionError
 * - 生成した値は凍結され、以後変更されない
 *
 * @param typeName メッセージ種別の識別子
 * @param fieldShape フィールド形状
 * @param mapping フィールド値
 */
export function createMessageValue(
  typeName: MessageTypeIdentity,
  fieldShape: FieldShape,
  mapping: FieldMapping
): MessageValue {
  const unexpected = Object.keys(mapping).filter((name) => !fieldShape.includes(name));
  if (unexpected.length > 0) {
    throw new MessageConstructionError(typeName, unexpected);
  }

  // Object.fromEntries は `__proto__` も自身のプロパティとして定義する
  const fields: FieldMapping = Object.fromEntries(
    fieldShape.map((name): [string, unknown] => [name, Object.hasOwn(mapping, name) ? mapping[name] : null])
  );

  return Object.freeze({
    typeName,
    fields: Object.freeze(fields),
    toString(): string {
      const body = fieldShape.map((name) => `${name}=${formatValue(fields[name])}`).join(', ');
      return body ? `<${typeName} ${body}>` : `<${typeName}>`;
    },
  });
}

/**
 * 型名とフィールド形状からメッセージ種別を定義する。
 * @param typeName メッセージ種別の識別子
 * @param fieldShape フィールド形状（位置引数の順序）
 */
export function defineMessageType(typeName: MessageTypeIdentity, fieldShape: FieldShape): MessageType {
  const shape = Object.freeze([...fieldShape]);
  return Object.freeze({
    typeName,
    fieldShape: shape,
    create: (fields: FieldMapping) => createMessageValue(typeName, shape, fields),
    toString: () => typeName,
  });
}
