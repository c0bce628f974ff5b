export {
  DatError,
  truncated,
  outOfRange,
  malformedHeader,
  malformedRecord,
  unsupportedVersion,
  readFailed,
  invalidParams,
  toDatError,
} from './errors.js';
export type { ErrorCode } from './errors.js';
export { setLogLevel, getLogLevel, logInfo, logDebug, logWarn, logError } from './log.js';
export type { LogLevel } from './log.js';
