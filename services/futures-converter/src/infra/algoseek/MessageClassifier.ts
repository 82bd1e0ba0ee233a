import type { RejectReason } from '@/application/interfaces/MetricsCollector';

/**
 * Type 列の下位 4 ビットがメッセージ種別を表す。
 * 約定・建玉・気配の 3 コード以外（管理系メッセージなど）はティックにしない。
 */
const MESSAGE_TYPE_MASK = 0b1111;
const TRADE_CODE = 0b0010;
const OPEN_INTEREST_CODE = 0b1011;
const QUOTE_CODE = 0b0001;

export type ClassifiedMessage =
  | { kind: 'trade' }
  | { kind: 'openInterest' }
  | { kind: 'quote'; isAsk: boolean }
  | { kind: 'rejected'; reason: Extract<RejectReason, 'unsupported_message_type' | 'unknown_side'> };

/**
 * メッセージ種別コードと Side 列から行の種別を判定する（純粋関数）。
 * @param typeCode Type 列の整数値
 * @param side Side 列の値。気配のときだけ参照する
 */
export function classifyMessage(typeCode: number, side: string | undefined): ClassifiedMessage {
  switch (typeCode & MESSAGE_TYPE_MASK) {
    case TRADE_CODE:
      return { kind: 'trade' };
    case OPEN_INTEREST_CODE:
      return { kind: 'openInterest' };
    case QUOTE_CODE:
      switch (side) {
        case 'B':
          return { kind: 'quote', isAsk: false };
        case 'S':
          return { kind: 'quote', isAsk: true };
        default:
          return { kind: 'rejected', reason: 'unknown_side' };
      }
    default:
      return { kind: 'rejected', reason: 'unsupported_message_type' };
  }
}
