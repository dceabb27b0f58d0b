import { BackendError } from "../common/errors.ts";
import { httpLog } from "../common/logging.ts";

export interface HttpRequest {
  method?: string;
  path: string;
  query?: URLSearchParams;
  jsonBody?: unknown;
  signal?: AbortSignal;
}

export interface HttpResponse {
  method: string;
  path: string;
  status: number;
  statusText: string;
  /** Parsed JSON body, or null for empty and non-JSON bodies */
  data: unknown;
  text: string;
}

export abstract class JsonClient {
  constructor(
    public readonly name: string,
    public readonly baseUrl: string | URL,
  ) {}

  protected abstract addAuthHeaders(headers: Headers): void | Promise<void>;

  /** Performs one HTTP exchange without judging the status */
  protected async sendHttp(opts: HttpRequest): Promise<HttpResponse> {
    let path = opts.path;
    if (opts.query?.toString()) {
      path += (path.includes('?') ? '&' : '?') + opts.query.toString();
    }

    const headers = new Headers();
    await this.addAuthHeaders(headers);
    headers.set('accept', `application/json`);
    headers.set('content-type', 'application/json');

    const method = opts.method ?? 'GET';
    opts.signal?.throwIfAborted();
    const resp = await fetch(this.buildUrl(path), {
      method,
      headers,
      body: opts.jsonBody !== undefined ? JSON.stringify(opts.jsonBody) : undefined,
      signal: opts.signal,
    });

    httpLog.debug(`${method} ${this.name} ${path} ${resp.status}`);

    const text = await resp.text();
    return {
      method, path,
      status: resp.status,
      statusText: resp.statusText,
      data: parseJson(text),
      text,
    };
  }

  /** Appends the request path to whatever path the base URL already has */
  private buildUrl(path: string) {
    const url = new URL(this.baseUrl);
    const base = url.pathname.replace(/\/+$/, '');
    return new URL(`${url.origin}${base}${path}`);
  }

  /** Performs an HTTP exchange and throws a BackendError on any failure status */
  protected async doHttp(opts: HttpRequest): Promise<unknown> {
    const resp = await this.sendHttp(opts);
    if (resp.status >= 400) {
      throw new BackendError(this.name, resp.status, resp.statusText, resp.text, null, null);
    }
    return resp.data;
  }
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
