import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { Tick } from '@/domain/models/Tick';
import type { TickPublisher } from '@/domain/repositories/TickPublisher';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/** ストリーム名のデフォルトプレフィックス */
export const DEFAULT_STREAM_PREFIX = 'md:futures';

/**
 * インフラ層: Redis Stream へのティック書き込み実装
 *
 * 責務: Tick を種別ごとの Redis Stream（<prefix>:trade など）に XADD する。
 */
export class TickStreamRepository implements TickPublisher {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param redisUrl Redis 接続 URL
   * @param streamPrefix ストリーム名のプレフィックス
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    redisUrl: string,
    private readonly streamPrefix: string = DEFAULT_STREAM_PREFIX,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.redis = new Redis(redisUrl);
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'TickStreamRepository' });
  }

  /**
   * ティックを Redis Stream に配信する。
   */
  async publish(tick: Tick): Promise<void> {
    const stream = this.getStreamName(tick.type);
    const payload = {
      symbol: tick.symbol.value,
      root: tick.symbol.root,
      market: tick.symbol.market,
      ts: tick.ts.toString(),
      value: tick.value.toString(),
      data: JSON.stringify(this.getKindFields(tick)),
    };

    try {
      await this.redis.xadd(stream, '*', ...Object.entries(payload).flat());
      this.metricsCollector?.incrementPublished(stream, tick.symbol.root);
    } catch (error) {
      this.metricsCollector?.incrementError('publish_error');
      this.logger.error('failed to publish tick', { err: error, stream, symbol: tick.symbol.value });
      throw error;
    }
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }

  private getStreamName(type: Tick['type']): string {
    return `${this.streamPrefix}:${type}`;
  }

  /**
   * 種別ごとのフィールドだけを取り出す（共通フィールドはストリームのキーに展開済み）。
   */
  private getKindFields(tick: Tick): Record<string, number | string | undefined> {
    switch (tick.type) {
      case 'trade':
        return { quantity: tick.quantity };
      case 'openInterest':
        return { exchange: tick.exchange };
      case 'quote':
        return tick.askPrice !== undefined
          ? { askPrice: tick.askPrice, askSize: tick.askSize }
          : { bidPrice: tick.bidPrice, bidSize: tick.bidSize };
    }
  }
}
