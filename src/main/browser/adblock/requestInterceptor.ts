/**
 * Binds a RequestFilter to an engine session's request hook.
 *
 * Enforcement is best-effort: the decision is always computed, but if the
 * engine cannot honour it the failure is reported to the caller rather than
 * treated as a filter fault.
 */
import type { OperationOutcome } from '../../../shared/types';
import { attemptEngineOperation, getErrorMessage, toError } from '../../../shared/utils/errorHandling';
import { createLogger } from '../../logger';
import type { BeforeRequestDetails, EngineSession } from '../engine';
import type { RequestFilter } from './RequestFilter';

const logger = createLogger('RequestInterceptor');

export interface RequestInterceptorHooks {
  onBlocked?: (details: BeforeRequestDetails) => void;
  /** Engine failed to apply a decision; the request may have gone through */
  onEnforcementError?: (details: BeforeRequestDetails, error: Error) => void;
}

/**
 * Install the filter as the session's `onBeforeRequest` listener.
 *
 * IMPORTANT: engines keep a single listener per session, so this must be
 * the only place that installs one.
 */
export function attachRequestFilter(
  session: EngineSession,
  filter: RequestFilter,
  hooks: RequestInterceptorHooks = {}
): OperationOutcome {
  const install = session.onBeforeRequest?.bind(session);

  const outcome = attemptEngineOperation(
    install &&
      (() =>
        install((details, callback) => {
          const blocked = filter.shouldBlock(details.url);
          try {
            callback(blocked ? { cancel: true } : {});
          } catch (error) {
            logger.warn('Engine could not enforce request decision', {
              url: details.url.slice(0, 200),
              blocked,
              error: getErrorMessage(error),
            });
            hooks.onEnforcementError?.(details, toError(error));
            return;
          }
          if (blocked) {
            logger.debug('Blocked request', { url: details.url.slice(0, 200), resourceType: details.resourceType });
            hooks.onBlocked?.(details);
          }
        })),
    'engine exposes no request interceptor'
  );

  if (outcome.status === 'succeeded') {
    logger.info('Request interceptor installed', { offTheRecord: session.isOffTheRecord });
  } else {
    logger.warn('Request interceptor not installed', {
      status: outcome.status,
      detail: outcome.status === 'failed' ? outcome.error.message : outcome.reason,
    });
  }
  return outcome;
}

/**
 * Remove the listener installed by attachRequestFilter.
 */
export function detachRequestFilter(session: EngineSession): OperationOutcome {
  const install = session.onBeforeRequest?.bind(session);
  return attemptEngineOperation(install && (() => install(null)), 'engine exposes no request interceptor');
}
