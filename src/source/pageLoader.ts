import { JSDOM, ResourceLoader, VirtualConsole } from 'jsdom';
import { FetchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { errorMessage } from '../shared/utils.js';

export interface LoadOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface LoadedPage {
  html: string;
  /** URL after redirects. */
  finalUrl: string;
}

export interface PageLoader {
  load(url: string, options: LoadOptions): Promise<LoadedPage>;
}

// 'abort' listeners never fire for a signal that was aborted beforehand
export function throwIfCancelled(url: string, signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new FetchError(`Page fetch cancelled: ${url}`, { url });
  }
}

/**
 * Plain HTTP GET of the page markup.
 */
export class HttpPageLoader implements PageLoader {
  constructor(private readonly userAgent: string) {}

  async load(url: string, options: LoadOptions): Promise<LoadedPage> {
    throwIfCancelled(url, options.signal);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,*/*;q=0.8',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new FetchError(`Page fetch failed: HTTP ${response.status} from ${url}`, {
          url,
          status: response.status,
        });
      }

      const html = await response.text();
      return { html, finalUrl: response.url || url };
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (options.signal?.aborted) {
        throw new FetchError(`Page fetch cancelled: ${url}`, { url });
      }
      if (err instanceof Error && err.name === 'AbortError') {
        throw new FetchError(`Page fetch timed out after ${options.timeoutMs}ms: ${url}`, {
          url,
          timeout: options.timeoutMs,
        });
      }
      throw new FetchError(`Page fetch failed: ${errorMessage(err)}`, { url });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Loads the page markup, then runs its scripts in jsdom and returns the DOM
 * as it stands once the window has loaded and `settleMs` has passed. The
 * timeout covers the download and the render together.
 */
export class RenderedPageLoader implements PageLoader {
  constructor(
    private readonly userAgent: string,
    private readonly settleMs: number,
    private readonly http: PageLoader = new HttpPageLoader(userAgent),
  ) {}

  async load(url: string, options: LoadOptions): Promise<LoadedPage> {
    throwIfCancelled(url, options.signal);
    const startedAt = Date.now();
    const page = await this.http.load(url, options);
    throwIfCancelled(url, options.signal);
    const remainingMs = Math.max(0, options.timeoutMs - (Date.now() - startedAt));

    const virtualConsole = new VirtualConsole();
    virtualConsole.on('jsdomError', (err) => {
      logger.debug({ url, error: err.message }, 'Page script error');
    });

    const dom = new JSDOM(page.html, {
      url: page.finalUrl,
      runScripts: 'dangerously',
      resources: new ResourceLoader({ userAgent: this.userAgent }),
      pretendToBeVisual: true,
      virtualConsole,
    });

    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;
    try {
      const settled = new Promise<void>((resolve) => {
        const settle = (): void => {
          timer = setTimeout(resolve, this.settleMs);
        };
        if (dom.window.document.readyState === 'complete') settle();
        else dom.window.addEventListener('load', settle, { once: true });
      });

      const deadline = new Promise<never>((_, reject) => {
        const fail = (): void =>
          reject(
            new FetchError(`Page render timed out after ${options.timeoutMs}ms: ${url}`, {
              url,
              timeout: options.timeoutMs,
            }),
          );
        const deadlineTimer = setTimeout(fail, remainingMs);
        void settled.finally(() => clearTimeout(deadlineTimer));
        onAbort = () => {
          clearTimeout(deadlineTimer);
          reject(new FetchError(`Page render cancelled: ${url}`, { url }));
        };
        options.signal?.addEventListener('abort', onAbort, { once: true });
      });

      await Promise.race([settled, deadline]);
      return { html: dom.serialize(), finalUrl: page.finalUrl };
    } finally {
      if (timer) clearTimeout(timer);
      if (onAbort) options.signal?.removeEventListener('abort', onAbort);
      dom.window.close();
    }
  }
}
