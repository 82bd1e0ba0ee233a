/**
 * ヘッダー行から解決した列位置。ストリームを開いた時点で一度だけ作り、以後は変更しない。
 * 見つからなかった列は -1。
 */
export interface HeaderColumns {
  readonly timestamp: number;
  readonly ticker: number;
  readonly type: number;
  readonly side: number;
  readonly securityId: number;
  readonly quantity: number;
  readonly price: number;
  /** 上記の最大インデックス。ヘッダーが無い場合は -1（列数チェックが効かない） */
  readonly columnsRequired: number;
}

const HEADER_NAMES = {
  timestamp: 'Timestamp',
  ticker: 'Ticker',
  type: 'Type',
  side: 'Side',
  securityId: 'SecurityID',
  quantity: 'Quantity',
  price: 'Price',
} as const;

const UNRESOLVED: HeaderColumns = Object.freeze({
  timestamp: -1,
  ticker: -1,
  type: -1,
  side: -1,
  securityId: -1,
  quantity: -1,
  price: -1,
  columnsRequired: -1,
});

/**
 * 1 行をカンマで分割する。クォートは解釈しない（ティッカーの '"' は後段で除去する）。
 */
export function splitFields(line: string): string[] {
  return line.split(',');
}

/**
 * ヘッダー行から既知の列名（大文字小文字を区別）の位置を解決する。
 * @param headerLine 先頭行。ファイルが空なら null
 */
export function resolveHeaderColumns(headerLine: string | null): HeaderColumns {
  if (!headerLine) {
    return UNRESOLVED;
  }

  const header = splitFields(headerLine);
  const timestamp = header.indexOf(HEADER_NAMES.timestamp);
  const ticker = header.indexOf(HEADER_NAMES.ticker);
  const type = header.indexOf(HEADER_NAMES.type);
  const side = header.indexOf(HEADER_NAMES.side);
  const securityId = header.indexOf(HEADER_NAMES.securityId);
  const quantity = header.indexOf(HEADER_NAMES.quantity);
  const price = header.indexOf(HEADER_NAMES.price);

  return Object.freeze({
    timestamp,
    ticker,
    type,
    side,
    securityId,
    quantity,
    price,
    columnsRequired: Math.max(timestamp, ticker, type, side, securityId, quantity, price),
  });
}

/**
 * 列位置が未解決（-1）または行が短い場合は undefined。
 */
export function fieldAt(fields: readonly string[], index: number): string | undefined {
  return index < 0 ? undefined : fields[index];
}
