export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export interface FetchTextOptions {
  timeoutMs: number;
  userAgent: string;
  accept?: string;
}

/** GET with a hard timeout. Network failures, timeouts and non-2xx answers all surface as UpstreamError. */
export const fetchText = async (url: string, options: FetchTextOptions): Promise<string> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': options.userAgent,
        Accept: options.accept ?? 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        'Cache-Control': 'no-cache',
      },
      redirect: 'follow',
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new UpstreamError(`Request failed: ${response.status} ${response.statusText}`.trim(), url, response.status);
    }
    return await response.text();
  } catch (error) {
    if (error instanceof UpstreamError) throw error;
    const reason = controller.signal.aborted
      ? `Timed out after ${options.timeoutMs}ms`
      : error instanceof Error
        ? error.message
        : String(error);
    throw new UpstreamError(reason, url);
  } finally {
    clearTimeout(timer);
  }
};
