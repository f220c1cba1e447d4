import { SourceFetchError, describeError } from '../errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpSessionOptions {
  userAgent: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

export interface TextResponse {
  status: number;
  body: string;
  contentType: string;
  url: string;
}

/**
 * Shared headers and timeout for every request made during one collection run.
 */
export class HttpSession {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpSessionOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  async getText(source: string, url: string, accept = '*/*'): Promise<TextResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: accept
        },
        redirect: 'follow',
        signal: controller.signal
      });
      const body = await response.text();
      return {
        status: response.status,
        body,
        contentType: response.headers.get('content-type') ?? '',
        url: response.url || url
      };
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.options.timeoutMs}ms`
        : describeError(error);
      throw new SourceFetchError(source, url, reason, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
