import { beforeEach, describe, expect, it } from 'vitest';
import type { RejectReason } from '@/application/interfaces/MetricsCollector';
import { AlgoSeekLineParser, type AlgoSeekLineParserOptions } from '@/infra/algoseek/AlgoSeekLineParser';
import { resolveHeaderColumns } from '@/infra/algoseek/HeaderColumns';
import { createResolver, HEADER, MULTIPLIERS } from '@test/unit/helpers/feed';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';

/**
 * 単体テスト: AlgoSeekLineParser
 *
 * - 行の絞り込み（列数・オプション/スプレッド・未知銘柄・乗数なし・シンボルフィルター）
 * - メッセージ種別ごとのティック生成
 * - 想定外の例外はログに残して読み飛ばす
 */
const TS = Date.UTC(2023, 5, 15, 9, 30, 12, 123);

describe('AlgoSeekLineParser', () => {
  let loggerMock: LoggerMock;
  let metricsMock: MetricsCollectorMock;

  const createParser = (overrides: Partial<AlgoSeekLineParserOptions> = {}) =>
    new AlgoSeekLineParser({
      columns: resolveHeaderColumns(HEADER),
      multipliers: MULTIPLIERS,
      symbolResolver: createResolver(),
      logger: loggerMock,
      metrics: metricsMock,
      ...overrides,
    });

  beforeEach(() => {
    loggerMock = new LoggerMock();
    metricsMock = new MetricsCollectorMock();
  });

  describe('正常系', () => {
    it('約定行を Trade ティックに変換する', () => {
      const tick = createParser().parse('20230615093012123,ESU3,2,,123,5,450000000000');

      expect(tick).toEqual({
        type: 'trade',
        symbol: { value: 'ESU3', root: 'ES', market: 'cme', expiry: { year: 2023, month: 9 } },
        ts: TS,
        value: 45,
        quantity: 5,
      });
      expect(metricsMock.incrementTicks).toHaveBeenCalledWith('trade', 'ES');
    });

    it('買い気配に乗数を適用する', () => {
      const tick = createParser().parse('20230615093012123,NQU3,1,B,456,10,123450000000000');

      expect(tick).toMatchObject({ type: 'quote', value: 24690, bidPrice: 24690, bidSize: 10 });
      expect(tick).not.toHaveProperty('askPrice');
      expect(tick).not.toHaveProperty('askSize');
    });

    it('売り気配は ask 側だけを持つ', () => {
      const tick = createParser().parse('20230615093012123,ESU3,1,S,123,7,450250000000');

      expect(tick).toMatchObject({ type: 'quote', value: 45.025, askPrice: 45.025, askSize: 7 });
      expect(tick).not.toHaveProperty('bidPrice');
    });

    it('建玉行は数量と市場を持つ', () => {
      const tick = createParser().parse('20230615093012123,CLQ3,11,,789,250000,');

      expect(tick).toEqual({
        type: 'openInterest',
        symbol: { value: 'CLQ3', root: 'CL', market: 'nymex', expiry: { year: 2023, month: 8 } },
        ts: TS,
        value: 250000,
        exchange: 'nymex',
      });
    });

    it('VX はスケールなしで価格を読む', () => {
      const tick = createParser().parse('20230615093012123,VXN3,2,,1,3,13.45');

      expect(tick).toMatchObject({ type: 'trade', value: 13.45, quantity: 3 });
    });

    it('クォートで囲まれたティッカーも受け付ける', () => {
      const tick = createParser().parse('20230615093012123,"ESU3",2,,123,1,450000000000');

      expect(tick?.symbol.value).toBe('ESU3');
    });

    it('シンボルフィルターは大文字小文字を区別しない', () => {
      const parser = createParser({ symbolFilter: ['es'] });

      expect(parser.parse('20230615093012123,ESU3,2,,123,5,450000000000')).not.toBeNull();
      expect(parser.inspect('20230615093012123,NQU3,2,,456,5,450000000000')).toEqual({
        accepted: false,
        reason: 'filtered',
      });
    });

    it('構築後に乗数表を書き換えても影響しない', () => {
      const multipliers = new Map(MULTIPLIERS);
      const parser = createParser({ multipliers });
      multipliers.delete('ES');

      expect(parser.parse('20230615093012123,ESU3,2,,123,5,450000000000')).not.toBeNull();
    });
  });

  describe('読み飛ばす行', () => {
    const rejectedLines: [string, string, RejectReason][] = [
      ['列数が足りない', '20230615093012123,ESU3,2,,123,5', 'insufficient_columns'],
      ['オプション（空白を含む）', '20230615093012123,ES U3,2,,123,5,450000000000', 'out_of_scope_ticker'],
      ['スプレッド（ハイフンを含む）', '20230615093012123,ESU3-ESZ3,2,,123,5,450000000000', 'out_of_scope_ticker'],
      ['クォート除去後に空', '20230615093012123,"",2,,123,5,450000000000', 'empty_ticker'],
      ['解決できないティッカー', '20230615093012123,XYZ,2,,123,5,450000000000', 'unknown_symbol'],
      ['乗数の無い銘柄', '20230615093012123,GCZ3,2,,123,5,450000000000', 'no_multiplier'],
      ['未対応のメッセージ種別', '20230615093012123,ESU3,4,,123,5,450000000000', 'unsupported_message_type'],
      ['気配の Side が不明', '20230615093012123,ESU3,1,X,123,5,450000000000', 'unknown_side'],
    ];

    it.each(rejectedLines)('%s', (_label, line, reason) => {
      const parser = createParser();

      expect(parser.inspect(line)).toEqual({ accepted: false, reason });
      expect(parser.parse(line)).toBeNull();
      expect(metricsMock.incrementRejected).toHaveBeenCalledWith(reason);
      expect(loggerMock.error).not.toHaveBeenCalled();
    });

    it('ヘッダーが無い場合は列が解決できず読み飛ばす', () => {
      const parser = createParser({ columns: resolveHeaderColumns(null) });

      expect(parser.inspect('20230615093012123,ESU3,2,,123,5,450000000000')).toEqual({
        accepted: false,
        reason: 'missing_field',
      });
    });
  });

  describe('エラーハンドリング: 想定外の値', () => {
    it('不正なタイムスタンプは元の行と一緒にログに残して読み飛ばす', () => {
      const line = '2023-06-15 09:30:12,ESU3,2,,123,5,450000000000';

      expect(createParser().parse(line)).toBeNull();
      expect(loggerMock.error).toHaveBeenCalledWith('failed to parse line', { err: expect.any(Error), line });
      expect(metricsMock.incrementError).toHaveBeenCalledWith('parse_error');
      expect(metricsMock.incrementRejected).toHaveBeenCalledWith('parse_error');
    });

    it('不正な価格・数量・種別コードは parse_error', () => {
      const parser = createParser();

      expect(parser.inspect('20230615093012123,ESU3,2,,123,5,abc')).toEqual({ accepted: false, reason: 'parse_error' });
      expect(parser.inspect('20230615093012123,ESU3,2,,123,x,450000000000')).toEqual({
        accepted: false,
        reason: 'parse_error',
      });
      expect(parser.inspect('20230615093012123,ESU3,T,,123,5,450000000000')).toEqual({
        accepted: false,
        reason: 'parse_error',
      });
      expect(loggerMock.error).toHaveBeenCalledTimes(3);
    });

    it('32 bit を超える種別コード・数量は下位ビットで判定せず parse_error', () => {
      const parser = createParser();

      // 2^32 + 2 は下位 4 bit だけ見ると約定になる
      expect(parser.parse('20230615093012123,ESU3,4294967298,,123,5,450000000000')).toBeNull();
      expect(parser.parse('20230615093012123,ESU3,2,,123,9007199254740993,450000000000')).toBeNull();
      expect(metricsMock.incrementRejected).toHaveBeenCalledTimes(2);
      expect(metricsMock.incrementRejected).toHaveBeenCalledWith('parse_error');
      expect(metricsMock.incrementTicks).not.toHaveBeenCalled();
    });

    it('リゾルバーが例外を投げても読み飛ばすだけ', () => {
      const parser = createParser({
        symbolResolver: {
          parse: () => {
            throw new Error('resolver failure');
          },
        },
      });

      expect(parser.parse('20230615093012123,ESU3,2,,123,5,450000000000')).toBeNull();
      expect(loggerMock.error).toHaveBeenCalledTimes(1);
    });
  });
});
