export type IssuedToken = {
  token: string;
  expiresAt: number; // epoch ms
};

type Options = {
  /** Refresh this long before the provider's expiry. */
  skewMs?: number;
  now?: () => number;
};

/**
 * Process-wide bearer token cache. Reads return the cached token while it
 * is fresh; a stale read triggers exactly one refresh that every concurrent
 * caller awaits. A failed refresh is not cached, so the next call retries.
 */
export class TokenCache {
  private current: IssuedToken | null = null;
  private inflight: Promise<IssuedToken> | null = null;
  private readonly skewMs: number;
  private readonly now: () => number;

  constructor(
    private readonly issue: () => Promise<IssuedToken>,
    opts: Options = {}
  ) {
    this.skewMs = opts.skewMs ?? 60_000;
    this.now = opts.now ?? Date.now;
  }

  isFresh(): boolean {
    return this.current !== null && this.now() < this.current.expiresAt - this.skewMs;
  }

  async get(): Promise<string> {
    if (this.current && this.isFresh()) return this.current.token;
    const issued = await this.refresh();
    return issued.token;
  }

  /** Drop the cached token, e.g. after the provider answers 401. */
  invalidate(): void {
    this.current = null;
  }

  private refresh(): Promise<IssuedToken> {
    if (!this.inflight) {
      this.inflight = this.issue()
        .then((issued) => {
          this.current = issued;
          return issued;
        })
        .finally(() => {
          this.inflight = null;
        });
    }
    return this.inflight;
  }
}
