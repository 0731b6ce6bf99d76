/**
 * Drama Collector — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Records & sources
export type {
  RecordFields,
  RecordFieldName,
  RawRecord,
  CanonicalRecord,
  SourceKind,
  SourceDescriptor,
  SourceErrorEntry,
} from './record';
export {
  RecordFieldsSchema,
  SourceKindSchema,
  RECORD_FIELD_NAMES,
  EXPECTED_FIELDS,
} from './record';

// Jobs
export type {
  JobState,
  JobTrigger,
  JobCounters,
  JobError,
  ExportedFile,
  Job,
  JobSnapshot,
  StartJobOptions,
  JobStatusListener,
} from './job';
export {
  JobStateSchema,
  JobTriggerSchema,
  TERMINAL_STATES,
  isTerminal,
} from './job';
