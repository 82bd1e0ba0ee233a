/**
 * 限月コード（F=1月 … Z=12月）。
 */
export type FutureMonthCode = 'F' | 'G' | 'H' | 'J' | 'K' | 'M' | 'N' | 'Q' | 'U' | 'V' | 'X' | 'Z';

/**
 * 先物銘柄の正規化された識別子。
 *
 * パーサーは root を使って乗数表・シンボルフィルター・スケール例外を引く。
 * 同一銘柄かどうかは value で比較できる。
 */
export interface FutureSymbol {
  /** クレンジング済みのティッカー（例: 'ESU3'） */
  value: string;
  /** 正規シンボル（例: 'ES'） */
  root: string;
  /** 市場識別子（例: 'cme'） */
  market: string;
  /** 限月 */
  expiry: {
    year: number;
    /** 1〜12 */
    month: number;
  };
}
