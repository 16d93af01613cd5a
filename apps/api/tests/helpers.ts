import { db } from '../src/db';
import { migrateLatest } from '../src/migrations';
import { ensureDefaultSettings } from '../src/repositories/settingsRepository';
import type { HttpTransport, TransportRequest } from '../src/services/httpTransport';

export async function resetDatabase() {
  await migrateLatest();
  await db('results').del();
  await db('prompts').del();
  await db('models').del();
  await db('settings').del();
  await ensureDefaultSettings();
}

export function completion(content: string) {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

export function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/** Resolves after `ms` unless the request's signal aborts first. */
export function abortableDelay(ms: number, signal: AbortSignal) {
  return new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

type Handler = (request: TransportRequest) => Promise<unknown>;

/** In-process stand-in for provider endpoints, keyed by endpoint URL. */
export class FakeTransport implements HttpTransport {
  readonly requests: TransportRequest[] = [];
  private readonly handlers = new Map<string, Handler>();

  on(endpointUrl: string, handler: Handler): this {
    this.handlers.set(endpointUrl, handler);
    return this;
  }

  async send(request: TransportRequest): Promise<unknown> {
    this.requests.push(request);
    const handler = this.handlers.get(request.endpointUrl);
    if (!handler) {
      throw new Error(`connect ECONNREFUSED ${request.endpointUrl}`);
    }
    return handler(request);
  }
}
