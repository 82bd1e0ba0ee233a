import type { Readable } from 'node:stream';

/**
 * ファイルパスから生のバイトストリームを開くインターフェイス。
 *
 * 解凍もここで済ませる。読み取り・解凍の失敗はストリームの error として届く。
 */
export interface StreamProvider {
  open(filePath: string): Readable;
}
