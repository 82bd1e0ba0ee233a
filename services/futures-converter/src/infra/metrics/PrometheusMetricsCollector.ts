import { Counter, Registry } from 'prom-client';
import type { MetricsCollector, RejectReason } from '@/application/interfaces/MetricsCollector';
import type { TickType } from '@/domain/models/Tick';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用して変換処理のメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly linesReadCounter: Counter;
  private readonly ticksCounter: Counter;
  private readonly rejectedCounter: Counter;
  private readonly publishedCounter: Counter;
  private readonly errorCounter: Counter;

  constructor() {
    this.register = new Registry();

    this.linesReadCounter = new Counter({
      name: 'converter_lines_read_total',
      help: 'Total number of data lines read from feed files',
      registers: [this.register],
    });

    this.ticksCounter = new Counter({
      name: 'converter_ticks_emitted_total',
      help: 'Total number of ticks produced from feed lines',
      labelNames: ['type', 'symbol'],
      registers: [this.register],
    });

    // 読み飛ばした行（理由別）
    this.rejectedCounter = new Counter({
      name: 'converter_lines_rejected_total',
      help: 'Total number of feed lines skipped without producing a tick',
      labelNames: ['reason'],
      registers: [this.register],
    });

    this.publishedCounter = new Counter({
      name: 'converter_ticks_published_total',
      help: 'Total number of ticks published to Redis Stream',
      labelNames: ['stream', 'symbol'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'converter_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });
  }

  incrementLinesRead(): void {
    this.linesReadCounter.inc();
  }

  incrementTicks(type: TickType, symbol: string): void {
    this.ticksCounter.inc({ type, symbol });
  }

  incrementRejected(reason: RejectReason): void {
    this.rejectedCounter.inc({ reason });
  }

  incrementPublished(stream: string, symbol: string): void {
    this.publishedCounter.inc({ stream, symbol });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }
}
