/**
 * exiftool module - argument construction, process execution and retry policy
 */

export {
  buildToolArguments,
  formatToolTimestamp,
  dateTagsFor,
  gpsArguments,
  GLOBAL_FLAGS,
  VIDEO_EXTENSIONS,
  type ToolArgumentsInput
} from './arguments.js';

export {
  ExifToolProcessRunner,
  type ToolResult,
  type ToolRunner,
  type ToolRunOptions
} from './runner.js';

export {
  MetadataExecutor,
  classifyResult,
  filterMinorWarnings,
  isLockedFileError,
  LOCKED_FILE_SIGNATURES,
  type ExecutorConfig,
  type Sleep,
  type WriteRequest
} from './executor.js';
