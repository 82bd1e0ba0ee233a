import type { Tick } from '@/domain/models/Tick';

/**
 * 行パーサーのインターフェイス（インフラ層で実装される）。
 */
export interface LineParser {
  /**
   * データ行 1 行をティックに変換する。
   * @param line ヘッダー以降の生の 1 行
   * @returns 正規化されたティック。対象外・不正な行は null
   */
  parse(line: string): Tick | null;
}
