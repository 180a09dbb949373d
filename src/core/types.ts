// ===== Outcomes =====

export type FileStatus = 'skipped' | 'fixed' | 'unchanged' | 'failed';

export type ErrorPolicy = 'fail' | 'continue';

/** Replacement counts keyed by rule name. */
export type ReplacementCounts = Record<string, number>;

export interface FileOutcome {
  path: string;
  status: FileStatus;
  replacements: ReplacementCounts;
  message?: string;
}

export interface PatchReport {
  outcomes: FileOutcome[];
  fixedCount: number;
  failedCount: number;
  dryRun: boolean;
}

// ===== Events =====

export interface FileSkippedEvent {
  type: 'file:skipped';
  path: string;
}

export interface FileFixedEvent {
  type: 'file:fixed';
  path: string;
  replacements: ReplacementCounts;
  dryRun: boolean;
}

export interface FileUnchangedEvent {
  type: 'file:unchanged';
  path: string;
  dryRun: boolean;
}

export interface FileFailedEvent {
  type: 'file:failed';
  path: string;
  message: string;
}

export interface BatchDoneEvent {
  type: 'batch:done';
  fixedCount: number;
  failedCount: number;
  dryRun: boolean;
}

export type PatchEvent =
  | FileSkippedEvent
  | FileFixedEvent
  | FileUnchangedEvent
  | FileFailedEvent
  | BatchDoneEvent;

export type PatchEventKind = PatchEvent['type'];

export type StampedEvent<E extends PatchEvent = PatchEvent> = E & {
  cursor: number;
  timestamp: number;
};

export interface Timeline {
  cursor: number;
  event: StampedEvent;
}
