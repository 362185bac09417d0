export { matches, findMatch, compilePatterns, type CompiledPattern } from './matcher.js';
export { ViolationLedger } from './ledger.js';
export { DecisionEngine, type DecisionEngineOptions } from './engine.js';
export { ControlLoop, type ControlLoopOptions } from './control-loop.js';
export { untilAborted, raceAbort, type EventSource } from './event-source.js';
export { ReplayEventSource } from './adapters/replay-source.js';
export {
  RecordStreamSource,
  type RecordStreamSourceOptions,
} from './adapters/record-stream-source.js';
export { createAccessEvent, boundedString, type AccessEventFields } from './event.js';
export {
  EVENT_RECORD_SIZE,
  BLOCK_COMMAND_SIZE,
  decodeEventRecord,
  encodeEventRecord,
  encodeBlockCommand,
} from './record.js';
export {
  DEFAULT_THRESHOLD,
  PolicyFileSchema,
  loadPolicyFile,
  parsePatternList,
  resolveConfig,
  type PolicyFile,
  type PolicyFlags,
} from './config.js';
export { formatBanner, formatBlocked, formatSummary, formatViolation } from './report.js';
export {
  ConfigError,
  EnforcementError,
  SourceClosedError,
  describeError,
  isAbortError,
} from './errors.js';
export { createConsoleLogger, silentLogger, type Logger } from './logger.js';
export * from './types.js';
