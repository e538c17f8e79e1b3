import type { TypeRegistry } from '@/application/interfaces/TypeRegistry';
import type { EntryPoint, FieldMapping, FieldShape, MessageTypeIdentity } from '@/domain/types';

/**
 * 位置引数とフィールド形状を組み合わせて名前付きのマッピングを作る。
 * 形状より多い引数は捨て、足りないフィールドは含めない。
 */
export function zipFields(fieldShape: FieldShape, args: readonly unknown[]): FieldMapping {
  const count = Math.min(fieldShape.length, args.length);
  return Object.fromEntries(fieldShape.slice(0, count).map((name, i): [string, unknown] => [name, args[i]]));
}

/**
 * カタログの全メッセージ種別について、型名ごとの入口関数を組み立てる。
 *
 * @param types メッセージ種別のカタログ
 * @param dispatch 転送先
 * @param overrides 型名ごとに差し替える入口関数（エラーイベント用）
 */
export function buildEntryPoints(
  types: TypeRegistry,
  dispatch: (typeName: MessageTypeIdentity, fields: FieldMapping) => void,
  overrides: Readonly<Record<MessageTypeIdentity, EntryPoint>> = {}
): ReadonlyMap<MessageTypeIdentity, EntryPoint> {
  const entryPoints = new Map<MessageTypeIdentity, EntryPoint>();

  for (const type of types.types()) {
    const { typeName, fieldShape } = type;
    entryPoints.set(typeName, (...args: unknown[]) => {
      dispatch(typeName, zipFields(fieldShape, args));
    });
  }

  for (const [typeName, entryPoint] of Object.entries(overrides)) {
    entryPoints.set(typeName, entryPoint);
  }

  return entryPoints;
}
