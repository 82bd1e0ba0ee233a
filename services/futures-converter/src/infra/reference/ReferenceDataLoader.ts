import { readFileSync } from 'node:fs';
import { ConfigurationError } from '@/domain/errors/ConverterErrors';

/**
 * インフラ層: 変換に使う参照データ（価格乗数表・市場表）の読み込み
 *
 * 読み込みは起動時に一度だけ行う。不正な内容は ConfigurationError にして起動を止める。
 */

/**
 * 価格乗数表（CSV: `Symbol,Multiplier`）をパースする。
 * 1 行目はヘッダー。空行と `#` で始まる行は無視する。
 */
export function parsePriceMultipliers(text: string, source = 'price multipliers'): Map<string, number> {
  const multipliers = new Map<string, number>();
  const lines = text.split(/\r?\n/);

  lines.slice(1).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      return;
    }

    const lineNumber = index + 2;
    const [symbol, rawMultiplier] = line.split(',').map((field) => field.trim());
    const multiplier = Number(rawMultiplier);
    if (!symbol || !rawMultiplier || !Number.isFinite(multiplier) || multiplier <= 0) {
      throw new ConfigurationError(`Invalid multiplier at ${source}:${lineNumber}: ${rawLine}`);
    }

    multipliers.set(symbol, multiplier);
  });

  return multipliers;
}

/**
 * 市場表（JSON: `{ "ES": "cme", ... }`）をパースする。
 */
export function parseFutureMarkets(text: string, source = 'future markets'): Map<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${source}`, { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Expected an object of root → market in ${source}`);
  }

  const markets = new Map<string, string>();
  for (const [root, market] of Object.entries(parsed)) {
    if (typeof market !== 'string' || !market) {
      throw new ConfigurationError(`Invalid market for ${root} in ${source}`);
    }
    markets.set(root, market);
  }
  return markets;
}

export function loadPriceMultipliers(filePath: string): Map<string, number> {
  return parsePriceMultipliers(readFileSync(filePath, 'utf8'), filePath);
}

export function loadFutureMarkets(filePath: string): Map<string, string> {
  return parseFutureMarkets(readFileSync(filePath, 'utf8'), filePath);
}
