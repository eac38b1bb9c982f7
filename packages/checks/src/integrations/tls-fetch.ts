import { Agent, fetch as undiciFetch } from 'undici';

export type FetchFn = typeof globalThis.fetch;

export interface FetchOptions {
  /** Accept self-signed or otherwise unverifiable certificates */
  insecure?: boolean;
  /** Abort every request after this many milliseconds unless the caller passes a signal */
  timeoutMs?: number;
}

/**
 * Native fetch ignores https.Agent; certificate checks can only be relaxed
 * through an undici dispatcher, which needs undici's own fetch.
 */
function unverifiedTlsTransport(): FetchFn {
  const dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
  type UndiciInit = NonNullable<Parameters<typeof undiciFetch>[1]>;

  return ((input: string | URL | Request, init?: RequestInit) =>
    undiciFetch(input, { ...init, dispatcher } as UndiciInit)) as FetchFn;
}

/** Builds the fetch used against vCenter. */
export function buildFetch(options: FetchOptions): FetchFn {
  const { insecure = false, timeoutMs } = options;
  const transport = insecure ? unverifiedTlsTransport() : globalThis.fetch.bind(globalThis);

  return (input, init) => {
    if (timeoutMs === undefined || init?.signal) {
      return transport(input, init);
    }
    return transport(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  };
}
