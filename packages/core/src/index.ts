export type {
  AppInvocationRequest,
  AppInvocationResponse,
  AppInvoker,
  AppInvokerOptions,
  AppResponseMode,
  LoggerLike,
} from './app/invoker';
export {
  AppInvocationError,
  DEFAULT_APP_INVOKE_TIMEOUT_MS,
  buildInvocationBody,
  createAppInvoker,
} from './app/invoker';
export type { Err, Ok, Result } from './result';
export { attempt, err, ok } from './result';
