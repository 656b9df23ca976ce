import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici';
import { AzamPayGateway } from '../src/psp/azampay.js';
import { GatewayError } from '../src/errors.js';
import type { SubmitRequest } from '../src/psp/gateway.js';

const AUTH = 'https://auth.example.test';
const CHECKOUT = 'https://checkout.example.test';

const request: SubmitRequest = {
  amount: '60.00',
  phoneNumber: '255712345678',
  provider: 'Mpesa',
  externalReference: '17',
};

function gateway(apiKey?: string): AzamPayGateway {
  return new AzamPayGateway({
    appName: 'snbl-test',
    clientId: 'test-client',
    clientSecret: 'test-secret',
    apiKey,
    authBaseUrl: AUTH,
    checkoutBaseUrl: `${CHECKOUT}/`,
  });
}

function jsonBody(body: unknown): unknown {
  return typeof body === 'string' ? JSON.parse(body) : null;
}

describe('AzamPayGateway', () => {
  let agent: MockAgent;
  let previous: Dispatcher;

  beforeEach(() => {
    previous = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(previous);
    await agent.close();
  });

  function mockToken(token = 'tok-1') {
    agent
      .get(AUTH)
      .intercept({
        path: '/AppRegistration/GenerateToken',
        method: 'POST',
        body: (b: string) => {
          const parsed = jsonBody(b);
          return (
            typeof parsed === 'object' &&
            parsed !== null &&
            'clientSecret' in parsed &&
            parsed.clientSecret === 'test-secret'
          );
        },
      })
      .reply(200, { data: { accessToken: token, expire: '2099-01-01T00:00:00Z' } });
  }

  it('fetches one token and sends the checkout request', async () => {
    mockToken();
    const sent: unknown[] = [];
    agent
      .get(CHECKOUT)
      .intercept({
        path: '/azampay/mno/checkout',
        method: 'POST',
        headers: { authorization: 'Bearer tok-1', 'x-api-key': 'test-key' },
        body: (b: string) => {
          sent.push(jsonBody(b));
          return true;
        },
      })
      .reply(200, { success: true, transactionId: 'AZ-100', message: 'Request in progress' })
      .times(2);

    const gw = gateway('test-key');
    const first = await gw.submit(request);
    const second = await gw.submit(request);

    expect(first).toEqual({ success: true, transactionId: 'AZ-100', message: 'Request in progress' });
    expect(second.transactionId).toBe('AZ-100');
    expect(sent[0]).toEqual({
      accountNumber: '255712345678',
      amount: '60.00',
      currency: 'TZS',
      externalId: '17',
      provider: 'Mpesa',
    });
    agent.assertNoPendingInterceptors();
  });

  it('passes a provider decline through', async () => {
    mockToken();
    agent
      .get(CHECKOUT)
      .intercept({ path: '/azampay/mno/checkout', method: 'POST' })
      .reply(200, { success: false, message: 'Insufficient balance' });

    expect(await gateway().submit(request)).toEqual({
      success: false,
      transactionId: undefined,
      message: 'Insufficient balance',
    });
  });

  it('drops the token when checkout answers 401', async () => {
    mockToken();
    agent
      .get(CHECKOUT)
      .intercept({ path: '/azampay/mno/checkout', method: 'POST' })
      .reply(401, { message: 'expired' });

    const gw = gateway();
    await expect(gw.submit(request)).rejects.toBeInstanceOf(GatewayError);
    expect(gw.tokens.isFresh()).toBe(false);
  });

  it('raises GatewayError for server errors and unreadable bodies', async () => {
    mockToken();
    const pool = agent.get(CHECKOUT);
    pool.intercept({ path: '/azampay/mno/checkout', method: 'POST' }).reply(503, 'unavailable');
    pool.intercept({ path: '/azampay/mno/checkout', method: 'POST' }).reply(200, '<html>oops</html>');
    pool.intercept({ path: '/azampay/mno/checkout', method: 'POST' }).reply(200, { ok: 1 });

    const gw = gateway();
    await expect(gw.submit(request)).rejects.toBeInstanceOf(GatewayError);
    await expect(gw.submit(request)).rejects.toBeInstanceOf(GatewayError);
    await expect(gw.submit(request)).rejects.toBeInstanceOf(GatewayError);
  });

  it('retries the token after a failed issue', async () => {
    agent
      .get(AUTH)
      .intercept({ path: '/AppRegistration/GenerateToken', method: 'POST' })
      .reply(500, 'boom');
    mockToken('tok-2');
    agent
      .get(CHECKOUT)
      .intercept({
        path: '/azampay/mno/checkout',
        method: 'POST',
        headers: { authorization: 'Bearer tok-2' },
      })
      .reply(200, { success: true, transactionId: 'AZ-2' });

    const gw = gateway();
    await expect(gw.submit(request)).rejects.toBeInstanceOf(GatewayError);
    expect((await gw.submit(request)).transactionId).toBe('AZ-2');
  });
});
