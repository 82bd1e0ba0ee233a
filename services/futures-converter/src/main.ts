import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import process from 'node:process';
import { ConvertFileUsecase } from '@/application/usecases/ConvertFileUsecase';
import { loadConfig } from '@/config/loadConfig';
import { AlgoSeekReaderFactory } from '@/infra/algoseek/AlgoSeekReaderFactory';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { TickStreamRepository } from '@/infra/redis/TickStreamRepository';
import { loadFutureMarkets, loadPriceMultipliers } from '@/infra/reference/ReferenceDataLoader';
import { FileStreamProvider } from '@/infra/stream/FileStreamProvider';
import { FutureSymbolParser } from '@/infra/symbols/FutureSymbolParser';

/**
 * エントリーポイント: 設定の読み込み、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - 参照データの読み込みとコンポーネントの生成
 * - SOURCE_FILES を 1 本ずつ順番に変換する
 *
 * 注意: 行のパースや配信の中身は main.ts に書かず、ただ「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const logger = LoggerFactory.create().child({ component: 'main' });
  const config = loadConfig();

  const multipliers = loadPriceMultipliers(config.priceMultipliersFile);
  const markets = loadFutureMarkets(config.futureMarketsFile);
  logger.info('reference data loaded', { multipliers: multipliers.size, markets: markets.size });

  const metrics = new PrometheusMetricsCollector();
  const publisher = new TickStreamRepository(config.redisUrl, config.streamPrefix, logger, metrics);
  const readerFactory = new AlgoSeekReaderFactory({
    multipliers,
    symbolFilter: config.symbolFilter,
    symbolResolver: new FutureSymbolParser(markets, config.referenceYear),
    streamProvider: new FileStreamProvider(),
    logger,
    metrics,
    requireHeader: config.requireHeader,
  });
  const usecase = new ConvertFileUsecase(readerFactory, publisher, logger);

  const shutdown = async (signal: string) => {
    logger.warn('stopping conversion', { signal });
    // 読み込み中のリーダーを閉じれば変換ループは次の行を読まずに抜ける
    await usecase.stop();
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    for (const filePath of config.sourceFiles) {
      const summary = await usecase.execute(filePath);
      if (summary.stopped) {
        break;
      }
    }
  } finally {
    await publisher.close();
    if (config.metricsFile) {
      await writeFile(config.metricsFile, await metrics.getMetrics(), 'utf8');
      logger.info('metrics written', { metricsFile: config.metricsFile });
    }
  }
}

bootstrap().catch((error) => {
  LoggerFactory.create().error('conversion failed', { err: error });
  process.exitCode = 1;
});
