import { z } from 'zod';
import { StaticTypeRegistry } from '@/infra/registry/StaticTypeRegistry';
import wrapperMessages from './wrapperMessages.json';

/**
 * カタログ定義のスキーマ: 型名 → 一意なフィールド名の配列
 */
const catalogSchema = z.record(
  z.string().min(1),
  z
    .array(z.string().min(1))
    .refine((fields) => new Set(fields).size === fields.length, { message: 'field names must be unique' })
);

export type CatalogDefinitions = z.infer<typeof catalogSchema>;

/**
 * カタログ定義を検証してメッセージ種別カタログを作る。
 * @param definitions 型名 → フィールド形状
 * @throws {z.ZodError} 定義が不正な場合
 */
export function loadCatalog(definitions: unknown): StaticTypeRegistry {
  return StaticTypeRegistry.fromDefinitions(catalogSchema.parse(definitions));
}

/**
 * 取引データサービスの受信メッセージ（既定カタログ）を読み込む。
 */
export function loadDefaultCatalog(): StaticTypeRegistry {
  return loadCatalog(wrapperMessages);
}
