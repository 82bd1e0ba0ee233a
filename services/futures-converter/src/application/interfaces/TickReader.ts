import type { Tick } from '@/domain/models/Tick';

/**
 * ファイル 1 本分のティックを前から順に返すリーダー。
 */
export interface TickReader extends AsyncIterable<Tick> {
  /**
   * ストリームを解放する。複数回呼んでも問題ない。
   */
  close(): Promise<void>;
}

/**
 * ファイルパスからリーダーを開くファクトリー（インフラ層で実装される）。
 */
export interface TickReaderFactory {
  open(filePath: string): Promise<TickReader>;
}
