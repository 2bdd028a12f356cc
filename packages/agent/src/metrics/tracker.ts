export type ToolExecutionMetric = {
  readonly toolName: string;
  readonly success: boolean;
  readonly durationMs: number;
  /** Unix epoch milliseconds. */
  readonly timestamp: number;
  readonly errorMessage?: string;
};

export type ToolStats = {
  readonly toolName: string;
  readonly totalExecutions: number;
  readonly successfulExecutions: number;
  readonly failedExecutions: number;
  readonly totalDurationMs: number;
  readonly averageDurationMs: number;
  readonly successRate: number;
  readonly lastUsed: number;
};

/** Append-only sink the loop records every executed tool call into. */
export interface MetricsSink {
  record(metric: ToolExecutionMetric): void;
}

export type MetricsTracker = MetricsSink & {
  readonly getExecutions: () => ReadonlyArray<ToolExecutionMetric>;
  readonly getToolStats: (toolName: string) => ToolStats | null;
  readonly getAllStats: () => ReadonlyArray<ToolStats>;
  readonly getRecentExecutions: (limit?: number) => ReadonlyArray<ToolExecutionMetric>;
  readonly getTotalExecutions: () => number;
  readonly getSuccessRate: () => number;
  readonly getMostUsedTools: (limit?: number) => ReadonlyArray<readonly [string, number]>;
  readonly getFastestTools: (limit?: number) => ReadonlyArray<readonly [string, number]>;
  readonly clear: () => void;
};

export function createMetricsTracker(
  history: ReadonlyArray<ToolExecutionMetric> = [],
): MetricsTracker {
  let metrics: Array<ToolExecutionMetric> = [...history];

  const statsFor = (toolName: string): ToolStats | null => {
    const entries = metrics.filter((m) => m.toolName === toolName);
    if (entries.length === 0) {
      return null;
    }

    const total = entries.length;
    const successful = entries.filter((m) => m.success).length;
    const totalDurationMs = entries.reduce((sum, m) => sum + m.durationMs, 0);

    return {
      toolName,
      totalExecutions: total,
      successfulExecutions: successful,
      failedExecutions: total - successful,
      totalDurationMs,
      averageDurationMs: totalDurationMs / total,
      successRate: successful / total,
      lastUsed: entries.reduce((latest, m) => Math.max(latest, m.timestamp), 0),
    };
  };

  const allStats = (): ReadonlyArray<ToolStats> => {
    const names = new Set(metrics.map((m) => m.toolName));
    return Array.from(names)
      .map(statsFor)
      .filter((s): s is ToolStats => s !== null)
      .sort((a, b) => b.totalExecutions - a.totalExecutions);
  };

  return {
    record(metric: ToolExecutionMetric): void {
      metrics.push(metric);
    },

    getExecutions() {
      return [...metrics];
    },

    getToolStats: statsFor,

    getAllStats: allStats,

    getRecentExecutions(limit = 10) {
      return [...metrics].sort((a, b) => b.timestamp - a.timestamp).slice(0, limit);
    },

    getTotalExecutions() {
      return metrics.length;
    },

    getSuccessRate() {
      if (metrics.length === 0) {
        return 0;
      }
      return metrics.filter((m) => m.success).length / metrics.length;
    },

    getMostUsedTools(limit = 5) {
      const counts = new Map<string, number>();
      for (const m of metrics) {
        counts.set(m.toolName, (counts.get(m.toolName) ?? 0) + 1);
      }
      return Array.from(counts.entries())
        .sort((a, b) => b[1] - a[1])
        .slice(0, limit);
    },

    getFastestTools(limit = 5) {
      return [...allStats()]
        .sort((a, b) => a.averageDurationMs - b.averageDurationMs)
        .slice(0, limit)
        .map((s) => [s.toolName, s.averageDurationMs] as const);
    },

    clear(): void {
      metrics = [];
    },
  };
}
