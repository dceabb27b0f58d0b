import { BackendError, ConfigurationError, TokenRenewalExhaustedError } from "../../common/errors.ts";
import { log } from "../../common/logging.ts";
import { JsonClient, type HttpRequest, type HttpResponse } from "../json-client.ts";
import { AuthResponse, ErrorResponse } from "./api.ts";

/** How many times one request may renew the session after a 401 */
export const MaxTokenRenewals = 3;

const SuccessStatuses = new Set([200, 201, 204]);

/** A sign-in shared by every request that found the session expired */
interface Renewal {
  done: Promise<void>;
  waiters: number;
  abort: AbortController;
}

export interface PiholeClientOptions {
  server?: string;
  password?: string;
}

/**
 * HTTP client for the Pi-hole v6 API.
 * Keeps a session id obtained with the admin password,
 * renewing it lazily when the server starts refusing it.
 */
export class PiholeClient extends JsonClient {
  #password: string | null;
  #token: string | null = null;
  #renewal: Renewal | null = null;

  constructor(opts: PiholeClientOptions) {
    super('pihole', requireServer(opts.server));
    this.#password = opts.password || null;
  }

  /** Builds a client, signing in first when a password is configured */
  static async connect(opts: PiholeClientOptions, signal?: AbortSignal) {
    const client = new PiholeClient(opts);
    await client.renewToken(null, signal);
    return client;
  }

  get hasToken() {
    return this.#token != null;
  }

  protected addAuthHeaders(headers: Headers) {
    if (this.#token) headers.set('X-FTL-SID', this.#token);
  }

  /**
   * Performs an API call, classifying the response.
   * Idempotent outcomes (already present on create, missing on delete) count as success.
   */
  async request(opts: HttpRequest): Promise<unknown> {
    for (let renewals = 0; ; renewals++) {
      const sentToken = this.#token;
      const resp = await this.sendHttp(opts);
      if (SuccessStatuses.has(resp.status)) return resp.data;

      const error = this.parseError(resp);
      if (error.message.includes('Item already present')) {
        log.debug(`Pi-hole already has ${resp.path}`);
        return null;
      }
      if (resp.status == 404 && resp.method == 'DELETE') {
        log.debug(`Pi-hole already lacks ${resp.path}`);
        return null;
      }

      if (resp.status != 401 || sentToken == null) throw error;
      if (renewals >= MaxTokenRenewals) {
        throw new TokenRenewalExhaustedError(this.name, renewals);
      }

      if (await this.checkTokenValidity(opts.signal)) {
        log.debug(`Pi-hole refused a session it reports as valid; retrying. Try (${renewals + 1}/${MaxTokenRenewals})`);
      } else {
        log.debug(`Pi-hole session has expired, fetching a new one. Try (${renewals + 1}/${MaxTokenRenewals})`);
        await this.renewToken(sentToken, opts.signal);
      }
    }
  }

  /** Asks Pi-hole whether the current session id is still accepted */
  async checkTokenValidity(signal?: AbortSignal) {
    if (this.#token == null) return false;
    const resp = await this.sendHttp({ path: '/api/auth', signal });
    const parsed = AuthResponse.safeParse(resp.data);
    if (!parsed.success) {
      throw new BackendError(this.name, resp.status, 'invalid_response',
        `unreadable session introspection: ${resp.text}`, null, null);
    }
    return parsed.data.session.valid;
  }

  /**
   * Replaces the session id, unless it already changed since `staleToken` was read.
   * Concurrent callers share one sign-in. A caller's signal only cancels its own wait;
   * the sign-in itself is cancelled once every caller waiting on it has given up.
   */
  async renewToken(staleToken: string | null, signal?: AbortSignal) {
    if (this.#password == null) return;
    if (this.#token !== staleToken) return;

    const renewal = this.#renewal ??= this.startRenewal(this.#password);
    renewal.waiters++;
    try {
      await untilSettledOrAborted(renewal.done, signal);
    } finally {
      renewal.waiters--;
      if (renewal.waiters == 0 && signal?.aborted) {
        if (this.#renewal === renewal) this.#renewal = null;
        renewal.abort.abort(signal.reason);
      }
    }
  }

  private startRenewal(password: string): Renewal {
    const abort = new AbortController();
    const renewal: Renewal = {
      abort,
      waiters: 0,
      done: this.retrieveNewToken(password, abort.signal)
        .finally(() => {
          if (this.#renewal === renewal) this.#renewal = null;
        }),
    };
    return renewal;
  }

  private async retrieveNewToken(password: string, signal?: AbortSignal) {
    const resp = await this.sendHttp({
      method: 'POST',
      path: '/api/auth',
      jsonBody: { password },
      signal,
    });
    if (!SuccessStatuses.has(resp.status)) throw this.parseError(resp);

    const parsed = AuthResponse.safeParse(resp.data);
    if (!parsed.success) {
      throw new BackendError(this.name, resp.status, 'invalid_response',
        `unreadable sign-in response: ${resp.text}`, null, null);
    }
    this.#token = parsed.data.session.sid ?? null;
    log.debug(`Signed in to Pi-hole`, { validity: parsed.data.session.validity });
  }

  private parseError(resp: HttpResponse) {
    const parsed = ErrorResponse.safeParse(resp.data);
    if (!parsed.success) {
      return new BackendError(this.name, resp.status, resp.statusText || 'unknown',
        resp.text, null, null);
    }
    const { error, took } = parsed.data;
    return new BackendError(this.name, resp.status, error.key, error.message,
      error.hint ?? null, took ?? null);
  }
}

/** Waits for the promise, giving up early when the signal aborts */
function untilSettledOrAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(resolve, reject).finally(() => {
      signal.removeEventListener('abort', onAbort);
    });
  });
}

function requireServer(server?: string) {
  if (!server) throw new ConfigurationError(`no Pi-hole server found in the configuration`);
  try {
    return new URL(server);
  } catch {
    throw new ConfigurationError(`invalid Pi-hole server URL: ${server}`);
  }
}
