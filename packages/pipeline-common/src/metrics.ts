/**
 * Per-pipeline tick and delivery counters.
 */
export interface PipelineMetrics {
  pipelineName: string
  ticks: number
  deliveries: number
  failures: number
  overruns: number
  recordsDelivered: number
  deliveryTimeMs: number // Sink calls only, successful or not
  lastDeliveryMs: number | null
}

export class MetricsCollector {
  private readonly pipelineName: string
  private readonly now: () => number
  private ticks = 0
  private deliveries = 0
  private failures = 0
  private overruns = 0
  private recordsDelivered = 0
  private deliveryTimeMs = 0
  private lastDeliveryMs: number | null = null

  constructor(pipelineName: string, now: () => number = () => performance.now()) {
    this.pipelineName = pipelineName
    this.now = now
  }

  recordTick(): void {
    this.ticks += 1
  }

  recordOverrun(): void {
    this.overruns += 1
  }

  /**
   * Times one sink call and counts it as a delivery or a failure.
   * Rethrows whatever the call throws.
   */
  async recordDelivery<T>(recordCount: number, fn: () => Promise<T>): Promise<T> {
    const start = this.now()
    try {
      const result = await fn()
      this.deliveries += 1
      this.recordsDelivered += recordCount
      return result
    } catch (error) {
      this.failures += 1
      throw error
    } finally {
      const elapsed = this.now() - start
      this.deliveryTimeMs += elapsed
      this.lastDeliveryMs = elapsed
    }
  }

  getMetrics(): PipelineMetrics {
    return {
      pipelineName: this.pipelineName,
      ticks: this.ticks,
      deliveries: this.deliveries,
      failures: this.failures,
      overruns: this.overruns,
      recordsDelivered: this.recordsDelivered,
      deliveryTimeMs: this.deliveryTimeMs,
      lastDeliveryMs: this.lastDeliveryMs,
    }
  }
}

/**
 * Formats one metrics row for the shutdown summary.
 */
export function formatMetrics(metrics: PipelineMetrics): string {
  const attempts = metrics.deliveries + metrics.failures
  const avg = attempts === 0 ? 0 : metrics.deliveryTimeMs / attempts
  return (
    `ticks=${metrics.ticks} delivered=${metrics.deliveries} failed=${metrics.failures} ` +
    `overruns=${metrics.overruns} records=${metrics.recordsDelivered} avgDelivery=${avg.toFixed(1)}ms`
  )
}
