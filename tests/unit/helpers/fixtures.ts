import { StaticTypeRegistry } from '@/infra/registry/StaticTypeRegistry';

/**
 * テスト用の小さなメッセージ種別カタログ
 */
export function createTestRegistry(): StaticTypeRegistry {
  return StaticTypeRegistry.fromDefinitions({
    tickPrice: ['tickerId', 'field', 'price', 'canAutoExecute'],
    tickSize: ['tickerId', 'field', 'size'],
    error: ['id', 'errorCode', 'errorMsg'],
  });
}
