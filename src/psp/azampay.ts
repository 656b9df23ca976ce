import { fetch } from 'undici';
import { z } from 'zod';
import { env, AZAMPAY_ENABLED } from '../config.js';
import { GatewayError } from '../errors.js';
import { moduleLogger } from '../logger.js';
import { TokenCache, type IssuedToken } from './tokenCache.js';
import type { PaymentGateway, SubmitRequest, SubmitResult } from './gateway.js';

const log = moduleLogger('azampay');

const AUTH_BASE = {
  sandbox: 'https://authenticator-sandbox.azampay.co.tz',
  live: 'https://authenticator.azampay.co.tz',
};
const CHECKOUT_BASE = {
  sandbox: 'https://sandbox.azampay.co.tz',
  live: 'https://checkout.azampay.co.tz',
};

// Fallback lifetime when the provider's expiry cannot be parsed.
const DEFAULT_TOKEN_TTL_MS = 55 * 60 * 1000;

const TokenRes = z.object({
  data: z.object({
    accessToken: z.string().min(1),
    expire: z.string().optional(),
  }),
});

const CheckoutRes = z.object({
  success: z.boolean(),
  transactionId: z.string().nullish(),
  message: z.string().nullish(),
});

export type AzamPayOptions = {
  appName: string;
  clientId: string;
  clientSecret: string;
  apiKey?: string;
  sandbox?: boolean;
  currency?: string;
  authBaseUrl?: string;
  checkoutBaseUrl?: string;
};

async function readJson(res: { json(): Promise<unknown> }, what: string): Promise<unknown> {
  try {
    return await res.json();
  } catch (err) {
    throw new GatewayError({ what, reason: 'response is not JSON', err: String(err) });
  }
}

export class AzamPayGateway implements PaymentGateway {
  readonly tokens: TokenCache;
  private readonly authBase: string;
  private readonly checkoutBase: string;
  private readonly currency: string;

  constructor(private readonly opts: AzamPayOptions) {
    const mode = opts.sandbox === false ? 'live' : 'sandbox';
    this.authBase = (opts.authBaseUrl ?? AUTH_BASE[mode]).replace(/\/$/, '');
    this.checkoutBase = (opts.checkoutBaseUrl ?? CHECKOUT_BASE[mode]).replace(/\/$/, '');
    this.currency = opts.currency ?? 'TZS';
    this.tokens = new TokenCache(() => this.generateToken());
  }

  private async generateToken(): Promise<IssuedToken> {
    const res = await fetch(`${this.authBase}/AppRegistration/GenerateToken`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify({
        appName: this.opts.appName,
        clientId: this.opts.clientId,
        clientSecret: this.opts.clientSecret,
      }),
    });
    if (!res.ok) {
      throw new GatewayError({ what: 'token', status: res.status });
    }
    const parsed = TokenRes.safeParse(await readJson(res, 'token'));
    if (!parsed.success) {
      throw new GatewayError({ what: 'token', reason: 'malformed response', issues: parsed.error.issues });
    }

    const expire = parsed.data.data.expire ? Date.parse(parsed.data.data.expire) : NaN;
    const expiresAt = Number.isFinite(expire) ? expire : Date.now() + DEFAULT_TOKEN_TTL_MS;
    log.debug({ expiresAt: new Date(expiresAt).toISOString() }, 'token issued');
    return { token: parsed.data.data.accessToken, expiresAt };
  }

  async submit(req: SubmitRequest): Promise<SubmitResult> {
    const token = await this.tokens.get();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.opts.apiKey) headers['X-API-Key'] = this.opts.apiKey;

    log.info({ externalId: req.externalReference, provider: req.provider }, 'mno checkout');

    const res = await fetch(`${this.checkoutBase}/azampay/mno/checkout`, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        accountNumber: req.phoneNumber,
        amount: req.amount,
        currency: this.currency,
        externalId: req.externalReference,
        provider: req.provider,
      }),
    });

    if (res.status === 401) this.tokens.invalidate();
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new GatewayError({ what: 'checkout', status: res.status, body });
    }

    const parsed = CheckoutRes.safeParse(await readJson(res, 'checkout'));
    if (!parsed.success) {
      throw new GatewayError({ what: 'checkout', reason: 'malformed response', issues: parsed.error.issues });
    }

    return {
      success: parsed.data.success,
      transactionId: parsed.data.transactionId ?? undefined,
      message: parsed.data.message ?? undefined,
    };
  }
}

/** Gateway built from env; throws when AzamPay credentials are missing. */
export function azampayFromEnv(): AzamPayGateway {
  if (!AZAMPAY_ENABLED) throw new Error('AzamPay not configured');
  return new AzamPayGateway({
    appName: env.AZAMPAY_APP_NAME,
    clientId: env.AZAMPAY_CLIENT_ID,
    clientSecret: env.AZAMPAY_CLIENT_SECRET,
    apiKey: env.AZAMPAY_API_KEY || undefined,
    sandbox: env.AZAMPAY_SANDBOX,
    currency: env.AZAMPAY_CURRENCY,
  });
}
