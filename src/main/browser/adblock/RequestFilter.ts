/**
 * Request Filter
 *
 * Substring ad blocking for outgoing requests. A request is blocked when its
 * lowercased URL contains any active pattern. There is no rule
 * syntax: no anchors, wildcards, exceptions or regular expressions.
 *
 * `shouldBlock` runs inline with every request the engine dispatches, so it
 * does no I/O and no per-pattern work beyond `includes`.
 */
import { EventEmitter } from 'node:events';
import type { FilterRule, FilterState, FilterStats } from '../../../shared/types';
import { createLogger } from '../../logger';
import { DEFAULT_FILTER_PATTERNS } from './defaultPatterns';

const logger = createLogger('RequestFilter');

export interface RequestFilterOptions {
  /** Saved rules; an empty or missing list selects the built-in defaults */
  patterns?: readonly string[];
  enabled?: boolean;
}

/**
 * Lowercases rules and drops empty ones. An empty rule is a substring of
 * every URL and would block all traffic.
 */
export function normalizePatterns(patterns: readonly string[]): FilterRule[] {
  return patterns
    .map((pattern) => pattern.toLowerCase())
    .filter((pattern) => pattern.length > 0);
}

export class RequestFilter extends EventEmitter {
  private configuredPatterns: FilterRule[];
  private activePatterns: FilterRule[];
  private enabled: boolean;
  private checked = 0;
  private blocked = 0;

  constructor(options: RequestFilterOptions = {}) {
    super();
    const saved = options.patterns ? normalizePatterns(options.patterns) : [];
    this.configuredPatterns = saved.length > 0 ? saved : [...DEFAULT_FILTER_PATTERNS];
    this.enabled = options.enabled ?? true;
    this.activePatterns = this.enabled ? this.configuredPatterns : [];
  }

  /**
   * Check if a request URL should be blocked
   */
  shouldBlock(url: string): boolean {
    this.checked++;
    if (this.activePatterns.length === 0) return false;

    const lowerUrl = url.toLowerCase();
    for (const pattern of this.activePatterns) {
      if (lowerUrl.includes(pattern)) {
        this.blocked++;
        return true;
      }
    }
    return false;
  }

  /**
   * Replace the configured rules. They become active immediately unless the
   * filter is disabled, in which case they are kept for re-enabling.
   */
  setPatterns(patterns: readonly string[]): void {
    this.configuredPatterns = normalizePatterns(patterns);
    if (this.enabled) {
      this.activePatterns = this.configuredPatterns;
    }
    logger.debug('Filter patterns updated', {
      patternCount: this.configuredPatterns.length,
      enabled: this.enabled,
    });
    this.emit('config-changed', this.getState());
  }

  /**
   * Disabling empties the active set only; the configured rules survive and
   * are re-activated verbatim when the filter is enabled again.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    this.activePatterns = enabled ? this.configuredPatterns : [];
    logger.info(`Request filter ${enabled ? 'enabled' : 'disabled'}`, {
      patternCount: this.configuredPatterns.length,
    });
    this.emit('config-changed', this.getState());
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** Configured rules, regardless of the enabled flag */
  getPatterns(): FilterRule[] {
    return [...this.configuredPatterns];
  }

  getActivePatterns(): FilterRule[] {
    return [...this.activePatterns];
  }

  getState(): FilterState {
    return { enabled: this.enabled, patterns: this.getPatterns() };
  }

  getStats(): FilterStats {
    return {
      enabled: this.enabled,
      patternCount: this.configuredPatterns.length,
      activePatternCount: this.activePatterns.length,
      checked: this.checked,
      blocked: this.blocked,
    };
  }

  resetStats(): void {
    this.checked = 0;
    this.blocked = 0;
  }
}
