/**
 * フィードの数値・時刻フィールドのパース。不正な値は例外を投げる（呼び出し側で行ごと読み飛ばす）。
 */

// yyyyMMddHHmmssfff（区切りなし・固定長）
const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(\d{3})$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

// 種別コード・数量は 32 bit 符号付き整数
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * フィード時刻をエポックミリ秒に変換する。
 * タイムゾーンは解釈せず、壁時計の値をそのまま UTC として扱う。
 */
export function parseFeedTimestamp(value: string): number {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid timestamp: ${value}`);
  }

  const [year, month, day, hour, minute, second, millisecond] = match.slice(1).map(Number);
  const ts = Date.UTC(year, month - 1, day, hour, minute, second, millisecond);

  // Date.UTC は 13 月や 2/30 を繰り上げてしまうので、往復して一致するか確認する
  const date = new Date(ts);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    throw new Error(`Invalid timestamp: ${value}`);
  }

  return ts;
}

/**
 * 32 bit 符号付き整数を読み取る。範囲外の値は丸めずにエラーにする。
 */
export function parseInteger(value: string | undefined, field: string): number {
  const trimmed = value?.trim() ?? '';
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new Error(`Invalid ${field}: ${value}`);
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < INT32_MIN || parsed > INT32_MAX) {
    throw new Error(`Out of range ${field}: ${value}`);
  }
  return parsed;
}

export function parseDecimal(value: string | undefined, field: string): number {
  const trimmed = value?.trim() ?? '';
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new Error(`Invalid ${field}: ${value}`);
  }
  return Number(trimmed);
}
