import type { TickReader, TickReaderFactory } from '@/application/interfaces/TickReader';
import { AlgoSeekFuturesReader, type AlgoSeekFuturesReaderOptions } from './AlgoSeekFuturesReader';

/**
 * 同じ乗数表・シンボルフィルター・リゾルバーでファイルごとにリーダーを開く。
 */
export class AlgoSeekReaderFactory implements TickReaderFactory {
  constructor(private readonly options: AlgoSeekFuturesReaderOptions) {}

  async open(filePath: string): Promise<TickReader> {
    return await AlgoSeekFuturesReader.open(filePath, this.options);
  }
}
