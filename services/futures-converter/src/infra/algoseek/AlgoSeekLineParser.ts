import type { LineParser } from '@/application/interfaces/LineParser';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector, RejectReason } from '@/application/interfaces/MetricsCollector';
import type { SymbolResolver } from '@/application/interfaces/SymbolResolver';
import type { FutureSymbol } from '@/domain/models/FutureSymbol';
import type { Tick } from '@/domain/models/Tick';
import { parseFeedTimestamp, parseInteger } from './FeedFields';
import { fieldAt, type HeaderColumns, splitFields } from './HeaderColumns';
import { classifyMessage } from './MessageClassifier';
import { assembleTick } from './TickAssembler';

/**
 * AlgoSeekLineParser の初期化オプション
 */
export interface AlgoSeekLineParserOptions {
  /** ヘッダー行から解決した列位置 */
  columns: HeaderColumns;
  /** 正規シンボル → 価格乗数 */
  multipliers: ReadonlyMap<string, number>;
  /** 出力対象の正規シンボル（大文字小文字を区別しない）。未指定なら全銘柄 */
  symbolFilter?: Iterable<string>;
  symbolResolver: SymbolResolver;
  logger: Logger;
  metrics?: MetricsCollector;
}

export type ParseOutcome = { accepted: true; tick: Tick } | { accepted: false; reason: RejectReason };

type Instrument = { symbol: FutureSymbol; multiplier: number };

// オプション・スプレッドのティッカーは空白かハイフンを含む
const OUT_OF_SCOPE_TICKER = /[ -]/;

function reject(reason: RejectReason): { accepted: false; reason: RejectReason } {
  return { accepted: false, reason };
}

/**
 * インフラ層: AlgoSeek 先物フィードの行パース処理
 *
 * 責務: データ行 1 行 → Tick への変換（列数・銘柄の絞り込み → メッセージ種別の判定 → ティック組み立て）。
 * 不正な行はエラーにせず null を返し、ストリームの読み込みは止めない。
 */
export class AlgoSeekLineParser implements LineParser {
  private readonly columns: HeaderColumns;
  private readonly multipliers: ReadonlyMap<string, number>;
  private readonly symbolFilter: ReadonlySet<string> | null;
  private readonly symbolResolver: SymbolResolver;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector | undefined;

  constructor(options: AlgoSeekLineParserOptions) {
    this.columns = options.columns;
    // 呼び出し元が後から書き換えても影響しないようにコピーしておく
    this.multipliers = new Map(options.multipliers);
    this.symbolFilter = options.symbolFilter
      ? new Set(Array.from(options.symbolFilter, (symbol) => symbol.toUpperCase()))
      : null;
    this.symbolResolver = options.symbolResolver;
    this.logger = options.logger;
    this.metrics = options.metrics;
  }

  parse(line: string): Tick | null {
    const outcome = this.inspect(line);
    if (!outcome.accepted) {
      this.metrics?.incrementRejected(outcome.reason);
      return null;
    }

    this.metrics?.incrementTicks(outcome.tick.type, outcome.tick.symbol.root);
    return outcome.tick;
  }

  /**
   * parse() と同じ判定を行い、読み飛ばした場合はその理由も返す。
   */
  inspect(line: string): ParseOutcome {
    try {
      return this.decode(line);
    } catch (error) {
      this.logger.error('failed to parse line', { err: error, line });
      this.metrics?.incrementError('parse_error');
      return reject('parse_error');
    }
  }

  private decode(line: string): ParseOutcome {
    const fields = splitFields(line);
    if (fields.length - 1 < this.columns.columnsRequired) {
      return reject('insufficient_columns');
    }

    const instrument = this.resolveInstrument(fieldAt(fields, this.columns.ticker));
    if ('reason' in instrument) {
      return instrument;
    }

    const ts = parseFeedTimestamp(fieldAt(fields, this.columns.timestamp) ?? '');
    const typeCode = parseInteger(fieldAt(fields, this.columns.type), 'type');

    const message = classifyMessage(typeCode, fieldAt(fields, this.columns.side));
    if (message.kind === 'rejected') {
      return reject(message.reason);
    }

    const tick = assembleTick({
      symbol: instrument.symbol,
      ts,
      message,
      rawPrice: fieldAt(fields, this.columns.price),
      rawQuantity: fieldAt(fields, this.columns.quantity),
      multiplier: instrument.multiplier,
    });
    return { accepted: true, tick };
  }

  /**
   * ティッカーを銘柄に解決し、乗数表とシンボルフィルターで絞り込む。
   */
  private resolveInstrument(rawTicker: string | undefined): Instrument | { accepted: false; reason: RejectReason } {
    if (rawTicker === undefined) {
      return reject('missing_field');
    }

    if (OUT_OF_SCOPE_TICKER.test(rawTicker)) {
      return reject('out_of_scope_ticker');
    }

    const ticker = rawTicker.replace(/^"+|"+$/g, '');
    if (!ticker) {
      return reject('empty_ticker');
    }

    const symbol = this.symbolResolver.parse(ticker);
    if (!symbol) {
      return reject('unknown_symbol');
    }

    const multiplier = this.multipliers.get(symbol.root);
    if (multiplier === undefined) {
      return reject('no_multiplier');
    }

    if (this.symbolFilter && !this.symbolFilter.has(symbol.root.toUpperCase())) {
      return reject('filtered');
    }

    return { symbol, multiplier };
  }
}
