import type { SymbolResolver } from '@/application/interfaces/SymbolResolver';
import type { FutureMonthCode, FutureSymbol } from '@/domain/models/FutureSymbol';

const MONTH_CODES: Record<FutureMonthCode, number> = {
  F: 1,
  G: 2,
  H: 3,
  J: 4,
  K: 5,
  M: 6,
  N: 7,
  Q: 8,
  U: 9,
  V: 10,
  X: 11,
  Z: 12,
};

// 例: ESU3, ESU23, 6EZ24。root は最短一致にして末尾の限月・年を優先する
const FUTURE_TICKER = /^([A-Z0-9]{1,4}?)([FGHJKMNQUVXZ])(\d{1,2})$/;
const ROOT_PATTERN = /^[A-Z0-9]*[A-Z][A-Z0-9]*$/;

/** 市場表に無い root の市場 */
export const DEFAULT_FUTURE_MARKET = 'cme';

function isMonthCode(value: string): value is FutureMonthCode {
  return value in MONTH_CODES;
}

/**
 * インフラ層: 先物ティッカー（root + 限月コード + 年）を FutureSymbol に解決する。
 *
 * 年が 1 桁の場合は referenceYear の年代（2026 なら 2020 年代）として読む。
 */
export class FutureSymbolParser implements SymbolResolver {
  private readonly markets: ReadonlyMap<string, string>;

  /**
   * @param markets root → 市場識別子
   * @param referenceYear 1 桁の年を補完する基準年
   */
  constructor(
    markets: ReadonlyMap<string, string>,
    private readonly referenceYear: number
  ) {
    this.markets = new Map(markets);
  }

  parse(ticker: string): FutureSymbol | null {
    const match = FUTURE_TICKER.exec(ticker.trim().toUpperCase());
    if (!match) {
      return null;
    }

    const [value, root, monthCode, yearDigits] = match;
    if (!ROOT_PATTERN.test(root) || !isMonthCode(monthCode)) {
      return null;
    }

    return {
      value,
      root,
      market: this.markets.get(root) ?? DEFAULT_FUTURE_MARKET,
      expiry: {
        year: this.resolveYear(yearDigits),
        month: MONTH_CODES[monthCode],
      },
    };
  }

  private resolveYear(digits: string): number {
    const year = Number.parseInt(digits, 10);
    if (digits.length === 2) {
      return 2000 + year;
    }
    return this.referenceYear - (this.referenceYear % 10) + year;
  }
}
