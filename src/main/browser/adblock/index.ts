/**
 * Ad Blocking Module
 *
 * Substring request filtering and its binding to the engine's request hook.
 */
export {
  RequestFilter,
  normalizePatterns,
  type RequestFilterOptions,
} from './RequestFilter';
export { DEFAULT_FILTER_PATTERNS } from './defaultPatterns';
export {
  attachRequestFilter,
  detachRequestFilter,
  type RequestInterceptorHooks,
} from './requestInterceptor';
