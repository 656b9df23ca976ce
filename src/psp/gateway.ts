// Contract the reconciliation core needs from a mobile-money processor.

export const PROVIDERS = ['Airtel', 'Tigo', 'Halopesa', 'Azampesa', 'Mpesa'] as const;
export type Provider = (typeof PROVIDERS)[number];

export type SubmitRequest = {
  amount: string;            // decimal with 2 fractional digits
  phoneNumber: string;       // normalized MSISDN, country code first
  provider: Provider;
  externalReference: string; // our order id
};

export type SubmitResult = {
  success: boolean;
  transactionId?: string;
  message?: string;
};

export interface PaymentGateway {
  /**
   * Ask the provider to collect `amount` from `phoneNumber`. Resolves with the
   * provider's verdict; rejects (usually with GatewayError) when the provider
   * could not be reached or answered with something unusable.
   */
  submit(req: SubmitRequest): Promise<SubmitResult>;
}

const PROVIDER_SET: ReadonlySet<string> = new Set(PROVIDERS);

export function isProvider(value: string): value is Provider {
  return PROVIDER_SET.has(value);
}
