import type { TickType } from '@/domain/models/Tick';

/**
 * 行を読み飛ばした理由。
 */
export type RejectReason =
  | 'insufficient_columns'
  | 'missing_field'
  | 'out_of_scope_ticker'
  | 'empty_ticker'
  | 'unknown_symbol'
  | 'no_multiplier'
  | 'filtered'
  | 'unsupported_message_type'
  | 'unknown_side'
  | 'parse_error';

/**
 * メトリクス収集インターフェース
 *
 * 責務: 変換処理のメトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * 読み込んだデータ行数をカウント（ヘッダー行は含まない）
   */
  incrementLinesRead(): void;

  /**
   * 出力したティック数をカウント
   * @param type ティック種別
   * @param symbol 正規シンボル（ES など）
   */
  incrementTicks(type: TickType, symbol: string): void;

  /**
   * 読み飛ばした行数を理由ごとにカウント
   */
  incrementRejected(reason: RejectReason): void;

  /**
   * 配信したティック数をカウント
   * @param stream ストリーム名（md:futures:trade など）
   * @param symbol 正規シンボル
   */
  incrementPublished(stream: string, symbol: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラータイプ（parse_error, publish_error）
   */
  incrementError(errorType: string): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;
}
