/**
 * Metrics tracking for index builds and loads
 */

export interface IndexMetrics {
  builds: number;
  buildFailures: number;
  loads: number;
  /** Loads that found no index file */
  misses: number;
  buildTimeMs: number[];
  loadTimeMs: number[];
  blocks: number;
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<string, IndexMetrics>();

  /**
   * Get or create metrics for a source file
   */
  #getMetrics(sourcePath: string): IndexMetrics {
    let metrics = this.#metrics.get(sourcePath);
    if (!metrics) {
      metrics = {
        builds: 0,
        buildFailures: 0,
        loads: 0,
        misses: 0,
        buildTimeMs: [],
        loadTimeMs: [],
        blocks: 0,
      };
      this.#metrics.set(sourcePath, metrics);
    }
    return metrics;
  }

  #pushSample(samples: number[], ms: number): void {
    samples.push(ms);
    // Keep only the most recent samples to avoid unbounded memory growth
    if (samples.length > MAX_SAMPLES) {
      samples.shift();
    }
  }

  /**
   * Record a completed build
   */
  recordBuild(sourcePath: string, ms: number, blocks: number): void {
    const metrics = this.#getMetrics(sourcePath);
    metrics.builds++;
    metrics.blocks = blocks;
    this.#pushSample(metrics.buildTimeMs, ms);
  }

  recordBuildFailure(sourcePath: string): void {
    this.#getMetrics(sourcePath).buildFailures++;
  }

  /**
   * Record a load; `blocks` is 0 when no index file existed
   */
  recordLoad(sourcePath: string, ms: number, blocks: number, found: boolean): void {
    const metrics = this.#getMetrics(sourcePath);
    metrics.loads++;
    if (!found) {
      metrics.misses++;
    }
    metrics.blocks = blocks;
    this.#pushSample(metrics.loadTimeMs, ms);
  }

  getMetrics(sourcePath: string): IndexMetrics | undefined {
    return this.#metrics.get(sourcePath);
  }

  getAllMetrics(): Map<string, IndexMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a series of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Reset metrics for one source file, or for all of them
   */
  reset(sourcePath?: string): void {
    if (sourcePath) {
      this.#metrics.delete(sourcePath);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
