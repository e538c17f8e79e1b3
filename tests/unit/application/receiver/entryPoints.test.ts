import { createTestRegistry } from '@test/unit/helpers/fixtures';
import { describe, expect, it, vi } from 'vitest';
import { buildEntryPoints, zipFields } from '@/application/receiver/entryPoints';
import { messageKey } from '@/application/receiver/messageKey';
import type { FieldMapping } from '@/domain/types';

/**
 * 単体テスト: 入口関数の組み立てとキー生成
 */
describe('zipFields', () => {
  it('位置引数をフィールド名に対応付ける', () => {
    expect(zipFields(['tickerId', 'field', 'size'], [1, 0, 25])).toEqual({ tickerId: 1, field: 0, size: 25 });
  });

  it('引数が足りない場合は渡された分だけを含める', () => {
    expect(zipFields(['tickerId', 'field', 'size'], [1])).toEqual({ tickerId: 1 });
  });

  it('形状より多い引数は捨てる', () => {
    expect(zipFields(['reqId'], [9, 'extra'])).toEqual({ reqId: 9 });
  });

  it('__proto__ という名前のフィールドもプロトタイプを変えずに自身のプロパティにする', () => {
    const mapping = zipFields(['__proto__', 'size'], [5, 25]);

    expect(Object.getPrototypeOf(mapping)).toBe(Object.prototype);
    expect(Object.keys(mapping)).toEqual(['__proto__', 'size']);
    expect(Object.getOwnPropertyDescriptor(mapping, '__proto__')?.value).toBe(5);
  });
});

describe('buildEntryPoints', () => {
  it('型ごとの入口関数が型名とマッピングで dispatch を呼ぶ', () => {
    const dispatch = vi.fn<(typeName: string, fields: FieldMapping) => void>();
    const entryPoints = buildEntryPoints(createTestRegistry(), dispatch);

    entryPoints.get('tickSize')?.(1, 0, 25);

    expect(dispatch).toHaveBeenCalledWith('tickSize', { tickerId: 1, field: 0, size: 25 });
  });

  it('overrides で指定した入口関数に差し替える', () => {
    const dispatch = vi.fn<(typeName: string, fields: FieldMapping) => void>();
    const errorEntry = vi.fn<(...args: unknown[]) => void>();
    const entryPoints = buildEntryPoints(createTestRegistry(), dispatch, { error: errorEntry });

    entryPoints.get('error')?.('bad feed');

    expect(errorEntry).toHaveBeenCalledWith('bad feed');
    expect(dispatch).not.toHaveBeenCalled();
  });
});

describe('messageKey', () => {
  it('文字列はそのままキーになる', () => {
    expect(messageKey('tickPrice')).toBe('tickPrice');
  });

  it('型名を持つオブジェクトは型名がキーになる', () => {
    const type = createTestRegistry().get('tickPrice');

    expect(messageKey(type)).toBe('tickPrice');
  });

  it('型名が文字列でないオブジェクトは文字列表現がキーになる', () => {
    expect(messageKey({ typeName: 5 })).toBe('[object Object]');
  });

  it('その他の値は文字列表現がキーになる', () => {
    expect(messageKey(42)).toBe('42');
    expect(messageKey(null)).toBe('null');
  });
});
