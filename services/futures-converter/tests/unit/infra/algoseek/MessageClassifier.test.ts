import { describe, expect, it } from 'vitest';
import { classifyMessage } from '@/infra/algoseek/MessageClassifier';

/**
 * 単体テスト: classifyMessage
 *
 * - 下位 4 ビットによる種別判定
 * - 気配の Side 判定
 */
describe('classifyMessage', () => {
  it('下位 4 ビットが 2 なら約定', () => {
    expect(classifyMessage(2, '')).toEqual({ kind: 'trade' });
    // 上位ビットは無視する
    expect(classifyMessage(0b1_0010, undefined)).toEqual({ kind: 'trade' });
  });

  it('下位 4 ビットが 11 なら建玉', () => {
    expect(classifyMessage(11, undefined)).toEqual({ kind: 'openInterest' });
    expect(classifyMessage(0b110_1011, 'B')).toEqual({ kind: 'openInterest' });
  });

  it('下位 4 ビットが 1 で Side が B なら買い気配', () => {
    expect(classifyMessage(1, 'B')).toEqual({ kind: 'quote', isAsk: false });
  });

  it('下位 4 ビットが 1 で Side が S なら売り気配', () => {
    expect(classifyMessage(17, 'S')).toEqual({ kind: 'quote', isAsk: true });
  });

  it('気配で Side が B / S 以外なら読み飛ばす', () => {
    for (const side of ['', 'b', 'A', undefined]) {
      expect(classifyMessage(1, side)).toEqual({ kind: 'rejected', reason: 'unknown_side' });
    }
  });

  it('その他のコードは読み飛ばす', () => {
    for (const code of [0, 3, 4, 10, 12, 15, 16]) {
      expect(classifyMessage(code, 'B')).toEqual({ kind: 'rejected', reason: 'unsupported_message_type' });
    }
  });
});
