/**
 * Drama Collector — Job Types
 */

import { z } from 'zod';

export const JobStateSchema = z.enum([
  'idle',
  'collecting',
  'processing',
  'storing',
  'exporting',
  'completed',
  'error',
]);
export type JobState = z.infer<typeof JobStateSchema>;

export const TERMINAL_STATES: readonly JobState[] = ['completed', 'error'];

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.includes(state);
}

export const JobTriggerSchema = z.enum(['manual', 'scheduled']);
export type JobTrigger = z.infer<typeof JobTriggerSchema>;

export interface JobCounters {
  totalCollected: number;
  totalProcessed: number;
  totalStored: number;
}

export interface JobError {
  source: string;
  message: string;
  timestamp: string;
}

export interface ExportedFile {
  path: string;
  size: number;
  format: string;
  recordCount: number;
  checksum: string;
}

export interface Job {
  id: string;
  state: JobState;
  trigger: JobTrigger;
  requestedCount: number;
  exportEnabled: boolean;
  qualityThreshold: number;
  /** Restricts collection to these sources when set */
  sources?: string[];
  /** 1 for the first run, incremented by scheduled retries */
  attempt: number;
  startTime: string;
  endTime?: string;
  counters: JobCounters;
  /** Records dropped by the quality filter */
  droppedRecords: number;
  errors: JobError[];
  exports: ExportedFile[];
  cancelled: boolean;
}

/**
 * Read-only copy handed to anything outside the orchestrator.
 */
export type JobSnapshot = Readonly<Job>;

export interface StartJobOptions {
  trigger?: JobTrigger;
  requestedCount: number;
  exportEnabled?: boolean;
  qualityThreshold?: number;
  sources?: string[];
  attempt?: number;
}

export type JobStatusListener = (job: JobSnapshot) => void;
