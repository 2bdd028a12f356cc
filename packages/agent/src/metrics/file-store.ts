import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { getLogger, type Logger } from '../logging/logger.js';
import { createMetricsTracker, type MetricsTracker, type ToolExecutionMetric } from './tracker.js';

const MetricSchema = z.object({
  toolName: z.string(),
  success: z.boolean(),
  durationMs: z.number().nonnegative(),
  timestamp: z.number(),
  errorMessage: z.string().optional(),
});

const MetricsFileSchema = z.object({
  metrics: z.array(MetricSchema),
  lastUpdated: z.number().optional(),
});

export type FileMetricsTrackerOptions = {
  readonly path: string;
  readonly logger?: Logger;
};

/** A tracker whose history survives restarts; `flush()` writes it out. */
export type FileMetricsTracker = MetricsTracker & {
  readonly path: string;
  readonly flush: () => Promise<void>;
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads a metrics file written by `saveMetrics`. A missing file is an empty
 * history; an unreadable or malformed one is logged and treated the same.
 */
export async function loadMetrics(
  path: string,
  logger: Logger = getLogger(),
): Promise<ReadonlyArray<ToolExecutionMetric>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    logger.warn({ err: error, path }, 'metrics file is not valid JSON, starting fresh');
    return [];
  }

  const parsed = MetricsFileSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn({ path, issues: parsed.error.issues.length }, 'metrics file has an unexpected shape, starting fresh');
    return [];
  }
  return parsed.data.metrics;
}

export async function saveMetrics(
  path: string,
  metrics: ReadonlyArray<ToolExecutionMetric>,
  now: () => number = Date.now,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const body = { metrics, lastUpdated: now() };
  await writeFile(path, `${JSON.stringify(body, null, 2)}\n`, 'utf-8');
}

export async function createFileMetricsTracker(options: FileMetricsTrackerOptions): Promise<FileMetricsTracker> {
  const logger = (options.logger ?? getLogger()).child({ module: 'metrics' });
  const history = await loadMetrics(options.path, logger);
  const tracker = createMetricsTracker(history);

  logger.debug({ path: options.path, loaded: history.length }, 'metrics loaded');

  return {
    ...tracker,
    path: options.path,
    flush: () => saveMetrics(options.path, tracker.getExecutions()),
  };
}
