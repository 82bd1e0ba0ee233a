import { ConfigurationError } from '@/domain/errors/ConverterErrors';
import { DEFAULT_STREAM_PREFIX } from '@/infra/redis/TickStreamRepository';

/**
 * 起動パラメータ
 */
export interface AppConfig {
  sourceFiles: string[];
  redisUrl: string;
  priceMultipliersFile: string;
  futureMarketsFile: string;
  /** 未指定なら全銘柄 */
  symbolFilter: string[] | undefined;
  streamPrefix: string;
  referenceYear: number;
  requireHeader: boolean;
  metricsFile: string | undefined;
}

export const DEFAULT_PRICE_MULTIPLIERS_FILE = 'config/price-multipliers.csv';
export const DEFAULT_FUTURE_MARKETS_FILE = 'config/future-markets.json';

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @throws {ConfigurationError} 環境変数が未設定の場合
 */
function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optionalEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function parseBoolean(key: string, value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${key} must be true or false, got: ${value}`);
  }
}

/**
 * 環境変数から起動パラメータを組み立てる。
 * @param env 環境変数（テストでは差し替える）
 * @param now REFERENCE_YEAR 未指定時の基準日時
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): AppConfig {
  const sourceFiles = splitList(requireEnv(env, 'SOURCE_FILES'));
  if (sourceFiles.length === 0) {
    throw new ConfigurationError('SOURCE_FILES must list at least one file');
  }

  const rawReferenceYear = optionalEnv(env, 'REFERENCE_YEAR');
  const referenceYear = rawReferenceYear === undefined ? now.getUTCFullYear() : Number(rawReferenceYear);
  if (!Number.isInteger(referenceYear) || referenceYear < 2000 || referenceYear > 2099) {
    throw new ConfigurationError(`REFERENCE_YEAR must be a year between 2000 and 2099, got: ${rawReferenceYear}`);
  }

  const rawFilter = optionalEnv(env, 'SYMBOL_FILTER');

  return {
    sourceFiles,
    redisUrl: requireEnv(env, 'REDIS_URL'),
    priceMultipliersFile: optionalEnv(env, 'PRICE_MULTIPLIERS_FILE') ?? DEFAULT_PRICE_MULTIPLIERS_FILE,
    futureMarketsFile: optionalEnv(env, 'FUTURE_MARKETS_FILE') ?? DEFAULT_FUTURE_MARKETS_FILE,
    symbolFilter: rawFilter === undefined ? undefined : splitList(rawFilter),
    streamPrefix: optionalEnv(env, 'STREAM_PREFIX') ?? DEFAULT_STREAM_PREFIX,
    referenceYear,
    requireHeader: parseBoolean('REQUIRE_HEADER', optionalEnv(env, 'REQUIRE_HEADER')),
    metricsFile: optionalEnv(env, 'METRICS_FILE'),
  };
}
