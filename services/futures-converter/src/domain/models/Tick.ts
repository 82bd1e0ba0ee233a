import type { FutureSymbol } from './FutureSymbol';

/**
 * ドメイン層: 正規化されたティックの型定義（DTO 的な型のみ）
 *
 * 注意: 種別ごとのクラス階層は作らない。3 種類のティックは生成以外の振る舞いを共有しないので、
 * type をタグにした判別共用体で表す。
 */

/**
 * ティック種別の列挙。
 */
export type TickType = 'trade' | 'quote' | 'openInterest';

interface TickBase {
  /** 銘柄 */
  symbol: FutureSymbol;
  /**
   * フィード上のローカル時刻（エポックミリ秒）。
   * タイムゾーン変換はせず、壁時計の値を UTC として格納する。
   */
  ts: number;
  /** 約定価格・気配価格（乗数適用済み）、または建玉数 */
  value: number;
}

export interface TradeTick extends TickBase {
  type: 'trade';
  quantity: number;
}

interface BidSide {
  bidPrice: number;
  bidSize: number;
  askPrice?: never;
  askSize?: never;
}

interface AskSide {
  askPrice: number;
  askSize: number;
  bidPrice?: never;
  bidSize?: never;
}

/**
 * 1 行の気配は片側だけを持つ（買いと売りが同時に埋まることはない）。
 */
export type QuoteTick = TickBase & { type: 'quote' } & (BidSide | AskSide);

export interface OpenInterestTick extends TickBase {
  type: 'openInterest';
  /** 銘柄の市場識別子 */
  exchange: string;
}

export type Tick = TradeTick | QuoteTick | OpenInterestTick;
