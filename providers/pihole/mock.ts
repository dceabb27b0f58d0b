/** One request as seen by the mock, with the path decoded */
export interface MockedCall {
  method: string;
  path: string;
  sid: string | null;
}

interface ForcedResponse {
  method: string;
  path: string;
  status: number;
  body: unknown;
}

/**
 * In-process stand-in for the Pi-hole v6 API, for use in place of the global fetch.
 * Keeps local DNS config lines and issued sessions in memory.
 */
export class PiholeServerMock {
  readonly calls = new Array<MockedCall>();
  readonly lines = {
    hosts: new Array<string>(),
    cnameRecords: new Array<string>(),
  };

  #sessions = new Set<string>();
  #issued = 0;
  #forced = new Array<ForcedResponse>();
  #signInGate: Promise<void> | null = null;

  constructor(
    private readonly password = 'test-secret',
  ) {}

  /** Forgets every session, as when Pi-hole restarts or sessions time out */
  expireSessions() {
    this.#sessions.clear();
  }

  /** Answers the next matching request with the given response instead */
  respondNext(method: string, path: string, status: number, body: unknown) {
    this.#forced.push({ method, path, status, body });
  }

  /** Keeps sign-ins pending until the returned function is called */
  holdSignIns() {
    let release = () => {};
    this.#signInGate = new Promise<void>(resolve => {
      release = () => resolve();
    });
    return () => {
      this.#signInGate = null;
      release();
    };
  }

  /** Calls as `METHOD /path` lines */
  callLines() {
    return this.calls.map(x => `${x.method} ${x.path}`);
  }

  readonly fetch = (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    if (init?.signal?.aborted) return Promise.reject(init.signal.reason);

    const url = new URL(input instanceof Request ? input.url : input);
    const method = init?.method ?? 'GET';
    const path = decodeURIComponent(url.pathname);
    const sid = new Headers(init?.headers).get('X-FTL-SID');
    this.calls.push({ method, path, sid });

    const forcedIdx = this.#forced.findIndex(x => x.method == method && x.path == path);
    if (forcedIdx >= 0) {
      const [forced] = this.#forced.splice(forcedIdx, 1);
      return Promise.resolve(respond(forced.status, forced.body));
    }

    const gate = this.#signInGate;
    const signal = init?.signal;
    if (gate && method == 'POST' && path == '/api/auth') {
      return new Promise((resolve, reject) => {
        if (signal) signal.addEventListener('abort', () => reject(signal.reason), { once: true });
        gate.then(() => resolve(this.handle(method, path, sid, init?.body)), reject);
      });
    }

    return Promise.resolve(this.handle(method, path, sid, init?.body));
  };

  private handle(method: string, path: string, sid: string | null, body: unknown): Response {
    if (path == '/api/auth') {
      if (method == 'POST') return this.signIn(body);
      const valid = sid != null && this.#sessions.has(sid);
      return respond(valid ? 200 : 401, {
        session: { valid, totp: false, sid: null, validity: valid ? 300 : -1 },
        took: 0.001,
      });
    }

    if (sid == null || !this.#sessions.has(sid)) {
      return errorResponse(401, 'unauthorized', 'Unauthorized', null);
    }

    const match = path.match(/^\/api\/config\/dns\/(hosts|cnameRecords)(?:\/(.+))?$/);
    if (!match) return errorResponse(404, 'not_found', 'Not found', null);
    const element = match[1] == 'hosts' ? 'hosts' : 'cnameRecords';
    const entry = match[2];
    const lines = this.lines[element];

    if (method == 'GET' && entry == null) {
      return respond(200, { config: { dns: { [element]: lines } }, took: 0.002 });
    }
    if (method == 'PUT' && entry != null) {
      if (lines.includes(entry)) {
        return errorResponse(400, 'bad_request', 'Item already present', 'Uniqueness of items is enforced');
      }
      lines.push(entry);
      return respond(201, { took: 0.004 });
    }
    if (method == 'DELETE' && entry != null) {
      const idx = lines.indexOf(entry);
      if (idx < 0) return errorResponse(404, 'not_found', 'Item not found', null);
      lines.splice(idx, 1);
      return respond(204, null);
    }
    return errorResponse(400, 'bad_request', 'Invalid request', null);
  }

  private signIn(body: unknown) {
    const password = typeof body == 'string' ? readPassword(body) : null;
    if (password !== this.password) {
      return errorResponse(401, 'unauthorized', 'Unauthorized', null);
    }
    const sid = `mock-sid-${++this.#issued}`;
    this.#sessions.add(sid);
    return respond(200, {
      session: { valid: true, totp: false, sid, validity: 300, message: 'password correct' },
      took: 0.01,
    });
  }
}

function readPassword(body: string): string | null {
  const parsed: unknown = JSON.parse(body);
  if (typeof parsed != 'object' || parsed == null || !('password' in parsed)) return null;
  return typeof parsed.password == 'string' ? parsed.password : null;
}

function respond(status: number, body: unknown) {
  return new Response(body == null ? null : JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

function errorResponse(status: number, key: string, message: string, hint: string | null) {
  return respond(status, { error: { key, message, hint }, took: 0.003 });
}
