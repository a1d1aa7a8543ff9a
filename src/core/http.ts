import { Agent, Dispatcher, interceptors } from "undici";

/** Redirect hops followed per request before the response is returned as is. */
export const MAX_REDIRECTIONS = 10;

export interface HttpClientOptions {
  /**
   * Idle limit, in seconds, for the response headers and for each gap between
   * body chunks. A body that keeps arriving is never cut off. 0 disables it.
   */
  timeoutSeconds: number;
  ignoreHttpsErrors: boolean;
}

/** Follows up to {@link MAX_REDIRECTIONS} redirects on every request sent through `dispatcher`. */
export function followRedirects(dispatcher: Dispatcher): Dispatcher {
  return dispatcher.compose(interceptors.redirect({ maxRedirections: MAX_REDIRECTIONS }));
}

/** One dispatcher shared by the API client and every transfer of a run. */
export function createHttpClient(options: HttpClientOptions): Dispatcher {
  const timeoutMs = Math.max(0, options.timeoutSeconds) * 1000;
  const agent = new Agent({
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
    connect: options.ignoreHttpsErrors ? { rejectUnauthorized: false } : undefined,
  });
  return followRedirects(agent);
}
