import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { StreamProvider } from '@/application/interfaces/StreamProvider';
import type { SymbolResolver } from '@/application/interfaces/SymbolResolver';
import type { TickReader } from '@/application/interfaces/TickReader';
import { MissingHeaderError } from '@/domain/errors/ConverterErrors';
import type { Tick } from '@/domain/models/Tick';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { AlgoSeekLineParser } from './AlgoSeekLineParser';
import { type HeaderColumns, resolveHeaderColumns } from './HeaderColumns';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * UTF-8 の BOM 付きファイルでは先頭列名に BOM が残るので取り除く。
 */
function stripByteOrderMark(line: string): string {
  return line.startsWith(BYTE_ORDER_MARK) ? line.slice(BYTE_ORDER_MARK.length) : line;
}

/**
 * AlgoSeekFuturesReader の初期化オプション
 */
export interface AlgoSeekFuturesReaderOptions {
  /** 正規シンボル → 価格乗数。乗数の無い銘柄は出力しない */
  multipliers: ReadonlyMap<string, number>;
  /** 出力対象の正規シンボル（大文字小文字を区別しない） */
  symbolFilter?: Iterable<string>;
  symbolResolver: SymbolResolver;
  streamProvider: StreamProvider;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** true の場合、ヘッダー行が空・欠落していたら open() を失敗させる */
  requireHeader?: boolean;
}

/**
 * インフラ層: AlgoSeek 先物ファイルを 1 行ずつ読み、Tick を順に取り出すリーダー
 *
 * 状態は Primed（current にティックがある）と Exhausted（読み切った / close 済み）の 2 つだけ。
 * 巻き戻しはできないので、読み直すときは open() し直す。
 *
 * @example
 * const reader = await AlgoSeekFuturesReader.open('ES_20230615.csv.gz', options);
 * for await (const tick of reader) {
 *   await publisher.publish(tick);
 * }
 */
export class AlgoSeekFuturesReader implements TickReader {
  private currentTick: Tick | null = null;
  private closed = false;

  private constructor(
    private readonly stream: Readable,
    private readonly lineReader: Interface,
    private readonly lines: AsyncIterator<string>,
    private readonly parser: AlgoSeekLineParser,
    private readonly logger: Logger,
    private readonly metrics: MetricsCollector | undefined,
    readonly columns: HeaderColumns
  ) {}

  /**
   * ファイルを開いてヘッダー行を解決し、最初のティックまで読み進める。
   * ストリームを開けない・読めない場合は reject する（開いたリソースは解放済み）。
   */
  static async open(filePath: string, options: AlgoSeekFuturesReaderOptions): Promise<AlgoSeekFuturesReader> {
    const logger = (options.logger ?? LoggerFactory.create()).child({ component: 'AlgoSeekFuturesReader', filePath });
    const stream = options.streamProvider.open(filePath);
    const lineReader = createInterface({ input: stream, crlfDelay: Infinity });
    const lines = lineReader[Symbol.asyncIterator]();

    try {
      const first = await lines.next();
      const headerLine = first.done ? null : stripByteOrderMark(first.value);
      const columns = resolveHeaderColumns(headerLine);

      if (!headerLine) {
        if (options.requireHeader) {
          throw new MissingHeaderError(filePath);
        }
        logger.warn('header line is missing; column positions are unresolved');
      }

      const parser = new AlgoSeekLineParser({
        columns,
        multipliers: options.multipliers,
        symbolFilter: options.symbolFilter,
        symbolResolver: options.symbolResolver,
        logger,
        metrics: options.metrics,
      });

      const reader = new AlgoSeekFuturesReader(stream, lineReader, lines, parser, logger, options.metrics, columns);
      await reader.moveNext();
      return reader;
    } catch (error) {
      lineReader.close();
      stream.destroy();
      throw error;
    }
  }

  /**
   * 現在のティック。読み切った後は null。
   */
  get current(): Tick | null {
    return this.currentTick;
  }

  /**
   * 次の有効な行まで読み進める。
   * @returns 新しいティックがあれば true。入力の終端または close 済みなら false
   */
  async moveNext(): Promise<boolean> {
    let tick: Tick | null = null;

    while (tick === null && !this.closed) {
      const next = await this.lines.next();
      // 読み込み待ちの間に close() された場合は結果を捨てる
      if (next.done || this.closed) {
        break;
      }

      this.metrics?.incrementLinesRead();
      tick = this.parser.parse(next.value);
    }

    this.currentTick = tick;
    return tick !== null;
  }

  /**
   * ストリームとラインリーダーを解放する。複数回呼んでも問題ない。
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.currentTick = null;
    this.lineReader.close();
    this.stream.destroy();
    this.logger.debug('reader closed');
  }

  /**
   * 現在のティックから順に返す。途中で break した場合も含め、終了時にリソースを解放する。
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<Tick, void, undefined> {
    try {
      let tick = this.currentTick;
      while (tick !== null) {
        yield tick;
        tick = (await this.moveNext()) ? this.currentTick : null;
      }
    } finally {
      await this.close();
    }
  }
}
