import { describe, expect, it } from 'vitest';
import {
  DEFAULT_FUTURE_MARKETS_FILE,
  DEFAULT_PRICE_MULTIPLIERS_FILE,
  loadConfig,
} from '@/config/loadConfig';
import { ConfigurationError } from '@/domain/errors/ConverterErrors';

const NOW = new Date(Date.UTC(2026, 9, 18));

const REQUIRED = {
  SOURCE_FILES: 'data/ES_20230615.csv.gz',
  REDIS_URL: 'redis://localhost:6379/0',
};

/**
 * 単体テスト: loadConfig
 *
 * - 必須環境変数の検証
 * - 省略時のデフォルト値
 * - 一覧・真偽値・年のパース
 */
describe('loadConfig', () => {
  it('必須項目だけならデフォルト値で補う', () => {
    expect(loadConfig({ ...REQUIRED }, NOW)).toEqual({
      sourceFiles: ['data/ES_20230615.csv.gz'],
      redisUrl: 'redis://localhost:6379/0',
      priceMultipliersFile: DEFAULT_PRICE_MULTIPLIERS_FILE,
      futureMarketsFile: DEFAULT_FUTURE_MARKETS_FILE,
      symbolFilter: undefined,
      streamPrefix: 'md:futures',
      referenceYear: 2026,
      requireHeader: false,
      metricsFile: undefined,
    });
  });

  it('一覧・真偽値・年を読み取る', () => {
    const config = loadConfig(
      {
        ...REQUIRED,
        SOURCE_FILES: ' a.csv , b.csv.gz ,',
        SYMBOL_FILTER: 'ES, nq',
        STREAM_PREFIX: 'md:test',
        REFERENCE_YEAR: '2023',
        REQUIRE_HEADER: 'TRUE',
        METRICS_FILE: 'metrics.prom',
      },
      NOW
    );

    expect(config.sourceFiles).toEqual(['a.csv', 'b.csv.gz']);
    expect(config.symbolFilter).toEqual(['ES', 'nq']);
    expect(config.streamPrefix).toBe('md:test');
    expect(config.referenceYear).toBe(2023);
    expect(config.requireHeader).toBe(true);
    expect(config.metricsFile).toBe('metrics.prom');
  });

  it('必須項目が無い場合は ConfigurationError', () => {
    expect(() => loadConfig({ REDIS_URL: REQUIRED.REDIS_URL }, NOW)).toThrow(
      'Missing required environment variable: SOURCE_FILES'
    );
    expect(() => loadConfig({ SOURCE_FILES: REQUIRED.SOURCE_FILES }, NOW)).toThrow(
      'Missing required environment variable: REDIS_URL'
    );
    expect(() => loadConfig({ ...REQUIRED, SOURCE_FILES: ' , ' }, NOW)).toThrow(
      'SOURCE_FILES must list at least one file'
    );
  });

  it('不正な値は ConfigurationError', () => {
    expect(() => loadConfig({ ...REQUIRED, REQUIRE_HEADER: 'yes' }, NOW)).toThrow(ConfigurationError);
    expect(() => loadConfig({ ...REQUIRED, REFERENCE_YEAR: '1999' }, NOW)).toThrow(ConfigurationError);
    expect(() => loadConfig({ ...REQUIRED, REFERENCE_YEAR: '2023.5' }, NOW)).toThrow(ConfigurationError);
  });
});
