export { createLogger, errorMessage } from './logger.js';
export {
  AbortError,
  isAbortError,
  throwIfAborted,
  raceAbort,
  withDeadline,
  sleep,
  type SleepFn,
} from './abort.js';
export { createDeferred, type Deferred } from './deferred.js';
