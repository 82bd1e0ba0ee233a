import { createReadStream } from 'node:fs';
import path from 'node:path';
import type { Readable } from 'node:stream';
import { createGunzip } from 'node:zlib';
import type { StreamProvider } from '@/application/interfaces/StreamProvider';
import { UnsupportedFileTypeError } from '@/domain/errors/ConverterErrors';

const PLAIN_EXTENSIONS = new Set(['.csv', '.txt']);
const GZIP_EXTENSIONS = new Set(['.gz']);

/**
 * インフラ層: ローカルファイルを拡張子に応じて開く StreamProvider 実装
 *
 * .csv / .txt はそのまま、.gz は gunzip を通して返す。
 * ファイルが無い・壊れている場合のエラーは返したストリームの error として届く。
 */
export class FileStreamProvider implements StreamProvider {
  open(filePath: string): Readable {
    const extension = path.extname(filePath).toLowerCase();

    if (PLAIN_EXTENSIONS.has(extension)) {
      return createReadStream(filePath);
    }

    if (GZIP_EXTENSIONS.has(extension)) {
      const source = createReadStream(filePath);
      const gunzip = createGunzip();
      // pipe() は読み込み元のエラーを伝えないので gunzip 側に流す
      source.on('error', (error) => gunzip.destroy(error));
      gunzip.on('close', () => source.destroy());
      return source.pipe(gunzip);
    }

    throw new UnsupportedFileTypeError(filePath);
  }
}
