import type { Logger } from '@/application/interfaces/Logger';
import type { TickReader, TickReaderFactory } from '@/application/interfaces/TickReader';
import type { TickType } from '@/domain/models/Tick';
import type { TickPublisher } from '@/domain/repositories/TickPublisher';

/**
 * ファイル 1 本分の変換結果
 */
export interface ConversionSummary {
  filePath: string;
  ticks: number;
  byType: Record<TickType, number>;
  /** stop() で途中終了した場合は true */
  stopped: boolean;
}

/**
 * アプリケーション層: ファイル変換ユースケース
 *
 * 責務: フィードファイルを読み、得られたティックを順に配信する司令塔。
 * ファイルを開けない・読めない・配信できない場合のエラーはそのまま呼び出し元に伝播する。
 */
export class ConvertFileUsecase {
  private activeReader: TickReader | null = null;
  private stopRequested = false;

  constructor(
    private readonly readerFactory: TickReaderFactory,
    private readonly publisher: TickPublisher,
    private readonly logger: Logger
  ) {}

  async execute(filePath: string): Promise<ConversionSummary> {
    const summary: ConversionSummary = {
      filePath,
      ticks: 0,
      byType: { trade: 0, quote: 0, openInterest: 0 },
      stopped: false,
    };
    if (this.stopRequested) {
      return { ...summary, stopped: true };
    }

    this.logger.info('conversion started', { filePath });
    const reader = await this.readerFactory.open(filePath);
    this.activeReader = reader;

    try {
      for await (const tick of reader) {
        // open() の途中で stop() された場合、リーダーはまだ閉じられていない
        if (this.stopRequested) {
          break;
        }
        await this.publisher.publish(tick);
        summary.ticks += 1;
        summary.byType[tick.type] += 1;
      }
    } finally {
      this.activeReader = null;
      await reader.close();
    }

    summary.stopped = this.stopRequested;
    this.logger.info('conversion finished', { ...summary });
    return summary;
  }

  /**
   * 変換を途中で止める。読み込み中のリーダーを閉じ、以降の execute() は何もしない。
   */
  async stop(): Promise<void> {
    this.stopRequested = true;
    if (this.activeReader) {
      await this.activeReader.close();
    }
  }
}
