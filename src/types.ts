export type ObjectDescriptor = {
  readonly key: string;
  readonly lastModified: Date;
};

/** Inclusive on both ends, UTC. */
export type TimeWindow = {
  start: Date;
  end: Date;
};

// One entry of a detector report; the detector owns its shape
export type DetectorEntry = Record<string, unknown>;

export type DetectorReport = {
  results: Record<string, DetectorEntry[]>;
  [extra: string]: unknown;
};

export type ScanFinding = {
  sourceFile: string;
  key: string;
  results: Record<string, DetectorEntry[]>;
};

export type ScanOutcome = {
  filePath: string;
  key: string;
  findingCount: number;
  recorded: boolean;
};

export type PipelineResult = {
  key: string;
  fetched: boolean;
  scans: number;
  findings: number;
  errors: string[];
};

export type SweepSummary = {
  listed: number;
  processed: number;
  failed: number;
  scans: number;
  findings: number;
};

export type ResultsFormat = 'text' | 'ndjson';
