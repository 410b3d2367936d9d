/**
 * Injection Driver
 *
 * Pushes every catalog extension's stylesheet and content script into a page
 * each time the page finishes loading. Injection is fire-and-forget: the
 * driver never awaits the page, never retries and never deduplicates. A page
 * that navigates away mid-pass simply loses the rest of that pass.
 */
import { EventEmitter } from 'node:events';
import type { ExtensionCatalog } from '../../../shared/types';
import { getErrorMessage } from '../../../shared/utils/errorHandling';
import { createLogger } from '../../logger';
import type { EnginePage, LoadFinishedListener } from '../engine';

const logger = createLogger('InjectionDriver');

export type InjectionKind = 'style' | 'script';

export interface InjectionStep {
  extension: string;
  kind: InjectionKind;
  code: string;
}

export interface InjectionFailure {
  extension: string;
  kind: InjectionKind;
  error: string;
  /** The page had started another load before this step failed */
  stale: boolean;
}

export interface InjectionSummary {
  pageId: string;
  generation: number;
  dispatched: number;
  succeeded: number;
  failures: InjectionFailure[];
}

export interface InjectionDispatch {
  pageId: string;
  generation: number;
  dispatched: number;
  /** For observers only; the driver itself never waits on it */
  settled: Promise<InjectionSummary>;
}

/**
 * Wrap raw CSS in a script that appends a <style> element to the document
 * head. The stylesheet is embedded as a JSON string literal.
 */
export function buildStyleInjectionScript(css: string): string {
  return (
    '(function(){' +
    "var style=document.createElement('style');" +
    `style.textContent=${JSON.stringify(css)};` +
    'document.head.appendChild(style);' +
    '})();'
  );
}

/**
 * Order the work for one pass: every stylesheet in catalog order, then every
 * content script in catalog order. Empty payloads are skipped.
 */
export function planInjection(catalog: ExtensionCatalog): InjectionStep[] {
  const steps: InjectionStep[] = [];

  for (const extension of catalog.values()) {
    if (extension.styleSheet) {
      steps.push({ extension: extension.name, kind: 'style', code: buildStyleInjectionScript(extension.styleSheet) });
    }
  }
  for (const extension of catalog.values()) {
    if (extension.contentScript) {
      steps.push({ extension: extension.name, kind: 'script', code: extension.contentScript });
    }
  }

  return steps;
}

export class InjectionDriver extends EventEmitter {
  private readonly generations = new Map<string, number>();
  private readonly attached = new Map<string, LoadFinishedListener>();

  constructor(private readonly getCatalog: () => ExtensionCatalog) {
    super();
  }

  /**
   * Run one full injection pass for a page-load-finished event.
   */
  onPageLoadFinished(page: EnginePage, catalog: ExtensionCatalog = this.getCatalog()): InjectionDispatch {
    const generation = (this.generations.get(page.id) ?? 0) + 1;
    this.generations.set(page.id, generation);

    const steps = planInjection(catalog);
    const pending = steps.map((step) => this.dispatchStep(page, generation, step));

    const settled = Promise.all(pending).then((failures) => {
      const summary: InjectionSummary = {
        pageId: page.id,
        generation,
        dispatched: steps.length,
        succeeded: failures.filter((failure) => failure === null).length,
        failures: failures.filter((failure): failure is InjectionFailure => failure !== null),
      };
      this.notify('injection-settled', summary);
      return summary;
    });

    if (steps.length > 0) {
      logger.debug('Injection pass dispatched', { pageId: page.id, generation, steps: steps.length });
    }

    return { pageId: page.id, generation, dispatched: steps.length, settled };
  }

  /**
   * Dispatch one step. Never rejects: failures resolve to a description.
   */
  private dispatchStep(page: EnginePage, generation: number, step: InjectionStep): Promise<InjectionFailure | null> {
    let running: Promise<unknown>;
    try {
      running = page.executeJavaScript(step.code);
    } catch (error) {
      running = Promise.reject(error);
    }

    return running.then(
      () => null,
      (error: unknown) => {
        const failure: InjectionFailure = {
          extension: step.extension,
          kind: step.kind,
          error: getErrorMessage(error),
          stale: this.generations.get(page.id) !== generation,
        };
        logger.debug('Injection step failed', { pageId: page.id, generation, ...failure });
        this.notify('injection-failed', { pageId: page.id, generation, ...failure });
        return failure;
      }
    );
  }

  /**
   * Listeners run inside promise callbacks; a throwing one must not reject the pass.
   */
  private notify(event: 'injection-settled' | 'injection-failed', payload: object): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      logger.warn('Injection listener threw', { event, error: getErrorMessage(error) });
    }
  }

  /**
   * Inject on every `did-finish-load` of the page. Returns a detach function.
   */
  attach(page: EnginePage): () => void {
    this.detach(page);

    const listener: LoadFinishedListener = (success) => {
      if (!success) {
        logger.debug('Injecting into page whose load failed', { pageId: page.id });
      }
      this.onPageLoadFinished(page);
    };
    page.on('did-finish-load', listener);
    this.attached.set(page.id, listener);

    return () => this.detach(page);
  }

  detach(page: EnginePage): void {
    const listener = this.attached.get(page.id);
    if (listener) {
      page.removeListener('did-finish-load', listener);
      this.attached.delete(page.id);
    }
    this.generations.delete(page.id);
  }

  isAttached(page: EnginePage): boolean {
    return this.attached.has(page.id);
  }
}
