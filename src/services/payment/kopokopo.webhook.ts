import { createHmac, timingSafeEqual } from 'crypto';
import { AppError } from '../../utils/AppError';
import type { PaymentOutcome, PaymentWebhookResult } from '../../types/payment';

export const KOPOKOPO_SIGNATURE_HEADER = 'x-kopokopo-signature';

// Till statuses that close the payment without money moving
const TILL_FAILURE_STATUSES = new Set(['failed', 'reversed', 'cancelled']);

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

function asString(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return '';
}

function asAmount(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseFloat(value);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}

/**
 * Checks the HMAC-SHA256 of the raw body, hex encoded, optionally prefixed "sha256="
 * An empty secret disables verification
 */
export function verifyKopoKopoSignature(
  secret: string,
  header: string | undefined,
  rawBody: string | Buffer
): boolean {
  if (!secret) {
    return true;
  }
  if (!header) {
    return false;
  }

  const provided = header.trim().replace(/^sha256=/i, '').toLowerCase();
  const expected = createHmac('sha256', secret).update(rawBody).digest('hex');

  const providedBytes = Buffer.from(provided);
  const expectedBytes = Buffer.from(expected);
  if (providedBytes.byteLength !== expectedBytes.byteLength) {
    return false;
  }
  return timingSafeEqual(providedBytes, expectedBytes);
}

/**
 * Till (buy goods) callback: top-level `topic`, no merchant order id
 */
function parseTillPayment(payload: JsonRecord): PaymentWebhookResult {
  const topic = asString(payload.topic);
  const resource = asRecord(asRecord(payload.event).resource);
  const status = asString(resource.status);

  // "Received" means the provider has seen the payment but it is not final
  let outcome: PaymentOutcome = 'pending';
  if (topic.toLowerCase().includes('transaction_received') && status === 'Success') {
    outcome = 'success';
  } else if (TILL_FAILURE_STATUSES.has(status.toLowerCase())) {
    outcome = 'failed';
  }

  return {
    kind: 'till_payment',
    orderId: asString(asRecord(resource.metadata).order_id),
    status,
    reference: asString(resource.reference),
    amount: asAmount(resource.amount),
    senderPhone: asString(resource.sender_phone_number),
    hashedSenderPhone: asString(resource.hashed_sender_phone),
    outcome,
    success: outcome === 'success',
  };
}

/**
 * STK push result callback: `data.attributes` with the order id in metadata
 */
function parseIncomingPayment(payload: JsonRecord): PaymentWebhookResult {
  const attributes = asRecord(asRecord(payload.data).attributes);
  const status = asString(attributes.status);
  const resource = asRecord(asRecord(attributes.event).resource);
  const success = status.toLowerCase() === 'success';

  return {
    kind: 'incoming_payment',
    orderId: asString(asRecord(attributes.metadata).order_id),
    status,
    reference: asString(resource.reference),
    amount: asAmount(resource.amount),
    senderPhone: asString(resource.sender_phone_number),
    hashedSenderPhone: '',
    outcome: success ? 'success' : 'failed',
    success,
  };
}

/**
 * @throws AppError 400 when the body is not a recognised Kopo Kopo callback
 */
export function parseKopoKopoWebhook(rawBody: string | Buffer): PaymentWebhookResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString());
  } catch {
    throw new AppError('Payment webhook body is not valid JSON', 400);
  }

  const payload = asRecord(parsed);

  if (typeof payload.topic === 'string') {
    return parseTillPayment(payload);
  }
  if (isRecord(payload.data)) {
    return parseIncomingPayment(payload);
  }

  throw new AppError('Unrecognised payment webhook payload', 400);
}
