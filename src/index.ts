// Main entry point
export { DateCleaner } from './DateCleaner.js';
export type { DateCleanerOptions } from './DateCleaner.js';

// Domain model
export type { FieldSpec } from './domain/model/FieldSpec.js';
export { createFieldSpec, fieldCandidates } from './domain/model/FieldSpec.js';
export type { DecodedDateTime } from './domain/model/DecodedDateTime.js';
export { isLeapYear, daysInMonth, isValidDateTime } from './domain/model/DecodedDateTime.js';
export type { FormatRule, TemplateFormatRule, SerialFormatRule, FormatRuleInfo } from './domain/model/FormatRule.js';
export { CleaningPolicy, OutputMode, DecodeFailureMode, DERIVED_COLUMN_SUFFIX, derivedColumnName } from './domain/model/CleaningPolicy.js';
export type { CleaningOptions } from './domain/model/CleaningPolicy.js';
export type { CleaningConfig } from './domain/model/CleaningConfig.js';
export type { TableSnapshot, TableColumn } from './domain/model/TableSnapshot.js';
export {
  createTableSnapshot,
  columnNames,
  rowCount,
  columnValues,
  replaceColumn,
  upsertColumn,
  dropRows,
  toRows,
} from './domain/model/TableSnapshot.js';
export type { ValueDecision, DecisionAction } from './domain/model/ValueDecision.js';
export type { TableCleaningSummary } from './domain/model/CleaningSummary.js';
export { RunStatus } from './domain/model/PipelineStep.js';
export type { PipelineStepSpec, StepContext, StepOutcome, RunResult } from './domain/model/PipelineStep.js';

// Errors
export { ConfigError, TemplateSyntaxError, FileFailureError } from './domain/errors/CleaningErrors.js';
export type { CleaningErrorCode } from './domain/errors/CleaningErrors.js';

// Domain services
export { DateTemplate } from './domain/services/DateTemplate.js';
export { decodeSerialDate, MAX_SERIAL_DAY } from './domain/services/SerialDate.js';
export { FormatRegistry, createFormatRule } from './domain/services/FormatRegistry.js';
export type { FormatRuleDefinition, FormatMatch, FormatRegistryOptions } from './domain/services/FormatRegistry.js';
export { FieldAliasResolver, ColumnLookup, normalizeColumnName } from './domain/services/FieldAliasResolver.js';
export { DateNormalizer } from './domain/services/DateNormalizer.js';
export type { NormalizedValue, ValueGroup } from './domain/services/DateNormalizer.js';
export { CleaningPolicyEngine } from './domain/services/CleaningPolicyEngine.js';

// Events
export type { DomainEvent, EventType, EventPayload } from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';

// Use case result types
export type { TableCleaningResult } from './application/usecases/CleanTable.js';
export type { FileCleaningResult } from './application/usecases/CleanFile.js';
export type { CleanFilesOptions, CleanFilesResult, FileJob } from './application/usecases/CleanFiles.js';

// Pipeline
export { PipelineSequencer } from './application/PipelineSequencer.js';
export type { PipelineSequencerOptions, PipelineRunOptions } from './application/PipelineSequencer.js';
export { createDateCleanStep, DATE_CLEAN_STEP_ID } from './application/steps/createDateCleanStep.js';
export type { DateCleanStepOptions } from './application/steps/createDateCleanStep.js';

// Ports (for custom implementations)
export type { TableCodec } from './domain/ports/TableCodec.js';

// Built-in adapters
export { CsvTableCodec } from './infrastructure/codecs/CsvTableCodec.js';
export type { CsvTableCodecOptions } from './infrastructure/codecs/CsvTableCodec.js';
export { loadCleaningConfig, parseCleaningConfig, DEFAULT_CONFIG_PATH } from './infrastructure/config/loadCleaningConfig.js';
export type { CleaningConfigInput } from './infrastructure/config/configSchema.js';
export { createLogger, rootLogger } from './infrastructure/logging/logger.js';
