import type { Tick } from '@/domain/models/Tick';

/**
 * ティックの配信先のインターフェイス（インフラ層で実装される）。
 */
export interface TickPublisher {
  /**
   * 正規化されたティックを配信する。
   * @param tick 正規化されたティック
   */
  publish(tick: Tick): Promise<void>;

  /**
   * 配信先との接続を閉じる。
   */
  close(): Promise<void>;
}
