/**
 * Error exports for core
 */

export {
  NeoWatchError,
  FormatError,
  ValidationError,
  SourceReadError,
  wrapError,
} from './neowatch-error.js';
export type {
  ErrorCode,
  SourceReadErrorCode,
  NeoWatchErrorDetails,
  SourceReadErrorDetails,
} from './neowatch-error.js';
