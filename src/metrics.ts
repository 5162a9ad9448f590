import fs from 'fs/promises';
import path from 'path';
import type { PipelineResult, SweepSummary } from './types.js';

export type Metrics = {
  objects_listed_total: number;
  objects_processed_total: number;
  objects_failed_total: number;
  fetch_failures_total: number;
  scans_total: number;
  findings_total: number;
  runtime_info?: {
    concurrency?: number;
    scanWorkers?: number;
    resultsFormat?: string;
    version?: string;
  };
};

export function newMetrics(): Metrics {
  return {
    objects_listed_total: 0,
    objects_processed_total: 0,
    objects_failed_total: 0,
    fetch_failures_total: 0,
    scans_total: 0,
    findings_total: 0,
  };
}

export function recordPipeline(metrics: Metrics, result: PipelineResult) {
  metrics.objects_processed_total++;
  if (result.errors.length) metrics.objects_failed_total++;
  if (!result.fetched) metrics.fetch_failures_total++;
  metrics.scans_total += result.scans;
  metrics.findings_total += result.findings;
}

export function recordSummary(metrics: Metrics, summary: SweepSummary) {
  metrics.objects_listed_total = summary.listed;
}

export function renderProm(metrics: Metrics): string {
  const lines: string[] = [];
  if (metrics.runtime_info) {
    const ri = metrics.runtime_info;
    const esc = (v: unknown) => String(v ?? '').replace(/"/g, '\\"');
    const labels = [
      `concurrency="${esc(ri.concurrency)}"`,
      `scan_workers="${esc(ri.scanWorkers)}"`,
      `results_format="${esc(ri.resultsFormat)}"`,
      `version="${esc(ri.version)}"`,
    ].join(',');
    lines.push('# HELP logsweep_runtime_info logsweep runtime configuration info');
    lines.push('# TYPE logsweep_runtime_info gauge');
    lines.push(`logsweep_runtime_info{${labels}} 1`);
  }
  const counters: Array<[keyof Omit<Metrics, 'runtime_info'>, string]> = [
    ['objects_listed_total', 'Objects listed inside the time window'],
    ['objects_processed_total', 'Object pipelines run to completion'],
    ['objects_failed_total', 'Object pipelines with at least one error'],
    ['fetch_failures_total', 'Objects that could not be downloaded'],
    ['scans_total', 'Detector runs that produced a valid report'],
    ['findings_total', 'Finding records written to the results file'],
  ];
  for (const [name, help] of counters) {
    lines.push(`# HELP logsweep_${name} ${help}`);
    lines.push(`# TYPE logsweep_${name} counter`);
    lines.push(`logsweep_${name} ${metrics[name]}`);
  }
  return lines.join('\n') + '\n';
}

export async function writeProm(metrics: Metrics, filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, renderProm(metrics), 'utf8');
}
