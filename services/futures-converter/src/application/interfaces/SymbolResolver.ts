import type { FutureSymbol } from '@/domain/models/FutureSymbol';

/**
 * ティッカー文字列を正規の銘柄に解決するインターフェイス。
 */
export interface SymbolResolver {
  /**
   * @param ticker クォート除去済みのティッカー（例: 'ESU3'）
   * @returns 解決できない場合は null
   */
  parse(ticker: string): FutureSymbol | null;
}
