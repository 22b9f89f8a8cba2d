export {
  DEFAULT_SLOW_CALL_WARNING_MS,
  Session,
  type EvaluateOptions,
  type SessionOptions,
} from './session.js';
