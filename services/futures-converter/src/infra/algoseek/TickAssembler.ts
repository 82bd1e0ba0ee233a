import type { FutureSymbol } from '@/domain/models/FutureSymbol';
import type { Tick } from '@/domain/models/Tick';
import { parseDecimal, parseInteger } from './FeedFields';
import type { ClassifiedMessage } from './MessageClassifier';

/** VX 以外の先物価格は小数点以下 10 桁を整数化して配信される */
export const PRICE_SCALE_FACTOR = 10_000_000_000;

/** スケールなしで配信される唯一の銘柄（VIX 先物） */
export const VOLATILITY_INDEX_ROOT = 'VX';

export type AcceptedMessage = Exclude<ClassifiedMessage, { kind: 'rejected' }>;

export interface TickFields {
  symbol: FutureSymbol;
  ts: number;
  message: AcceptedMessage;
  /** Price 列の生の値 */
  rawPrice: string | undefined;
  /** Quantity 列の生の値 */
  rawQuantity: string | undefined;
  /** 銘柄の価格乗数 */
  multiplier: number;
}

export function scaleFactorFor(root: string): number {
  return root === VOLATILITY_INDEX_ROOT ? 1 : PRICE_SCALE_FACTOR;
}

/**
 * 生の価格を実際の価格に戻す（スケール解除 → 乗数適用）。
 */
export function scalePrice(rawPrice: number, root: string, multiplier: number): number {
  return (rawPrice / scaleFactorFor(root)) * multiplier;
}

/**
 * 判定済みの行からティックを組み立てる。数値が不正な場合は例外を投げる。
 */
export function assembleTick({ symbol, ts, message, rawPrice, rawQuantity, multiplier }: TickFields): Tick {
  const quantity = parseInteger(rawQuantity, 'quantity');

  // 建玉行は価格を使わない
  if (message.kind === 'openInterest') {
    return {
      type: 'openInterest',
      symbol,
      ts,
      value: quantity,
      exchange: symbol.market,
    };
  }

  const price = scalePrice(parseDecimal(rawPrice, 'price'), symbol.root, multiplier);

  if (message.kind === 'trade') {
    return { type: 'trade', symbol, ts, value: price, quantity };
  }

  return message.isAsk
    ? { type: 'quote', symbol, ts, value: price, askPrice: price, askSize: quantity }
    : { type: 'quote', symbol, ts, value: price, bidPrice: price, bidSize: quantity };
}
