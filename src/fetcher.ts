import { SolverError } from './errors.js';
import type { ImageFetcher } from './types.js';

export class HttpImageFetcher implements ImageFetcher {
  constructor(
    private readonly timeoutMs = 10_000,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async fetch(url: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (err) {
      throw new SolverError(`Image request failed: ${url}`, 'transient', { cause: err });
    }
    if (!response.ok) {
      throw new SolverError(`Image request returned ${response.status}: ${url}`);
    }
    return Buffer.from(await response.arrayBuffer());
  }
}
