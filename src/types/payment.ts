export type PaymentErrorCode = 'CONFIG_ERROR' | 'AUTH_FAILED' | 'STK_PUSH_FAILED' | 'QUEUE_FULL';

/**
 * Payment error class for handling payment-specific errors
 */
export class PaymentError extends Error {
  constructor(
    message: string,
    public readonly code: PaymentErrorCode,
    public readonly provider: 'KOPOKOPO',
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'PaymentError';
    Object.setPrototypeOf(this, PaymentError.prototype);
  }
}

/**
 * Kopo Kopo OAuth token response
 */
export interface KopoKopoTokenResponse {
  access_token: string;
  token_type: string;
  expires_in?: number;
  created_at?: number;
}

/**
 * Kopo Kopo incoming payment (STK push) request payload
 */
export interface KopoKopoStkRequest {
  payment_channel: 'M-PESA STK Push';
  till_number: string;
  subscriber: {
    phone_number: string;
  };
  amount: {
    currency: 'KES';
    value: string;
  };
  metadata: {
    order_id: string;
  };
  _links: {
    callback_url: string;
  };
}

export interface KopoKopoStkResponse {
  /** Location of the created payment request, when the provider returns one */
  location: string;
}

/**
 * Sends one push-charge request to the payment provider
 */
export interface StkPushSender {
  sendStkPush(orderId: string, phone: string, amount: number): Promise<KopoKopoStkResponse>;
}

export type DispatchOutcome = 'queued' | 'deduplicated';

/**
 * Accepts charge requests for asynchronous, rate-limited delivery
 * Throws PaymentError QUEUE_FULL when the request cannot be accepted
 */
export interface PaymentDispatcher {
  enqueue(orderId: string, phone: string, amount: number): DispatchOutcome;
}

export type PaymentCallbackKind = 'incoming_payment' | 'till_payment';

export type PaymentOutcome = 'success' | 'pending' | 'failed';

/**
 * Parsed payment callback, consumed immediately by the reconciler
 */
export interface PaymentWebhookResult {
  kind: PaymentCallbackKind;
  orderId: string;
  status: string;
  reference: string;
  amount: number;
  senderPhone: string;
  hashedSenderPhone: string;
  outcome: PaymentOutcome;
  success: boolean;
}
