import { describe, expect, it } from 'vitest';
import { resolveErrorCall } from '@/application/receiver/ErrorDispatchAdapter';

/**
 * 単体テスト: resolveErrorCall
 *
 * エラーイベントの 3 種類の呼び出し形状と、どれにも当てはまらない場合の扱い
 */
describe('resolveErrorCall', () => {
  describe('正常系', () => {
    it('(整数, 整数, 文字列) は coded として id, errorCode, errorMsg に振り分ける', () => {
      expect(resolveErrorCall([7, 504, 'timeout'])).toEqual({
        shape: 'coded',
        fields: { id: 7, errorCode: 504, errorMsg: 'timeout' },
      });
    });

    it('文字列 1 つは text として errorMsg に入れる', () => {
      expect(resolveErrorCall(['bad feed'])).toEqual({ shape: 'text', fields: { errorMsg: 'bad feed' } });
    });

    it('任意の値 1 つは opaque として errorMsg に入れる', () => {
      expect(resolveErrorCall([42])).toEqual({ shape: 'opaque', fields: { errorMsg: 42 } });
    });

    it('Error オブジェクト 1 つもそのまま errorMsg に入れる', () => {
      const failure = new Error('socket closed');

      const call = resolveErrorCall([failure]);

      expect(call.shape).toBe('opaque');
      expect(call.fields.errorMsg).toBe(failure);
    });
  });

  describe('エッジケース: どの形状にも当てはまらない引数', () => {
    it('引数 2 つは組全体を errorMsg にする', () => {
      expect(resolveErrorCall([7, 504])).toEqual({ shape: 'opaque', fields: { errorMsg: [7, 504] } });
    });

    it('引数なしは空の組を errorMsg にする', () => {
      expect(resolveErrorCall([])).toEqual({ shape: 'opaque', fields: { errorMsg: [] } });
    });

    it('id が整数でない 3 引数は coded にならない', () => {
      expect(resolveErrorCall([7.5, 504, 'timeout'])).toEqual({
        shape: 'opaque',
        fields: { errorMsg: [7.5, 504, 'timeout'] },
      });
    });

    it('errorCode が文字列の 3 引数は coded にならない', () => {
      expect(resolveErrorCall([7, '504', 'timeout'])).toEqual({
        shape: 'opaque',
        fields: { errorMsg: [7, '504', 'timeout'] },
      });
    });

    it('4 引数以上も例外を投げない', () => {
      expect(() => resolveErrorCall([1, 2, 'x', 'extra'])).not.toThrow();
      expect(resolveErrorCall([1, 2, 'x', 'extra']).shape).toBe('opaque');
    });
  });
});
