/**
 * ストリーム単位の致命的なエラー。
 *
 * 行単位の不正はエラーにせず読み飛ばすので、ここに並ぶのは呼び出し元まで伝播させるものだけ。
 */

/**
 * 乗数表・市場表・環境変数などの設定不備。
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';
}

/**
 * 拡張子からストリームの開き方を決められないファイル。
 */
export class UnsupportedFileTypeError extends Error {
  override readonly name = 'UnsupportedFileTypeError';

  constructor(readonly filePath: string) {
    super(`Unsupported file type: ${filePath}`);
  }
}

/**
 * ヘッダー行が必須なのに、先頭行が空またはファイルが空だった。
 */
export class MissingHeaderError extends Error {
  override readonly name = 'MissingHeaderError';

  constructor(readonly filePath: string) {
    super(`Missing header line: ${filePath}`);
  }
}
