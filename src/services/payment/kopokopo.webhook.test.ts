import { describe, it, expect } from 'vitest';
import { createHmac } from 'crypto';
import { parseKopoKopoWebhook, verifyKopoKopoSignature } from './kopokopo.webhook';
import { AppError } from '../../utils/AppError';
import { incomingPaymentBody, tillPaymentBody } from '../../test/webhooks';

describe('parseKopoKopoWebhook', () => {
  it('reads the order id from an incoming payment callback', () => {
    expect(parseKopoKopoWebhook(incomingPaymentBody('order-1', 'Success'))).toEqual({
      kind: 'incoming_payment',
      orderId: 'order-1',
      status: 'Success',
      reference: 'REF123',
      amount: 1500,
      senderPhone: '+254712345678',
      hashedSenderPhone: '',
      outcome: 'success',
      success: true,
    });
  });

  it('treats status case-insensitively for incoming payments', () => {
    expect(parseKopoKopoWebhook(incomingPaymentBody('order-1', 'SUCCESS')).success).toBe(true);
    expect(parseKopoKopoWebhook(incomingPaymentBody('order-1', 'Failed')).outcome).toBe('failed');
  });

  it('classifies a till callback with status Success as successful', () => {
    const result = parseKopoKopoWebhook(tillPaymentBody({ status: 'Success', hashedSenderPhone: 'abc' }));
    expect(result).toMatchObject({
      kind: 'till_payment',
      orderId: '',
      amount: 1500,
      hashedSenderPhone: 'abc',
      outcome: 'success',
      success: true,
    });
  });

  it('does not treat a Received till callback as paid', () => {
    const result = parseKopoKopoWebhook(tillPaymentBody({ status: 'Received' }));
    expect(result.success).toBe(false);
    expect(result.outcome).toBe('pending');
  });

  it('requires both the transaction topic and exact Success for till callbacks', () => {
    expect(parseKopoKopoWebhook(tillPaymentBody({ status: 'success' })).success).toBe(false);
    expect(
      parseKopoKopoWebhook(tillPaymentBody({ status: 'Success', topic: 'b2b_transaction_received' })).success
    ).toBe(true);
    expect(parseKopoKopoWebhook(tillPaymentBody({ status: 'Success', topic: 'settlement_transfer_completed' })).success).toBe(false);
    expect(parseKopoKopoWebhook(tillPaymentBody({ status: 'Reversed' })).outcome).toBe('failed');
  });

  it('rejects bodies that are not callbacks', () => {
    expect(() => parseKopoKopoWebhook('not json')).toThrow(AppError);
    expect(() => parseKopoKopoWebhook('{"hello":"world"}')).toThrow('Unrecognised payment webhook payload');
  });
});

describe('verifyKopoKopoSignature', () => {
  const body = incomingPaymentBody('order-1', 'Success');
  const signature = createHmac('sha256', 'test-secret').update(body).digest('hex');

  it('accepts the hex HMAC with or without a sha256= prefix', () => {
    expect(verifyKopoKopoSignature('test-secret', signature, body)).toBe(true);
    expect(verifyKopoKopoSignature('test-secret', `sha256=${signature}`, Buffer.from(body))).toBe(true);
  });

  it('rejects a wrong or missing signature', () => {
    const forged = createHmac('sha256', 'other-secret').update(body).digest('hex');
    expect(verifyKopoKopoSignature('test-secret', forged, body)).toBe(false);
    expect(verifyKopoKopoSignature('test-secret', undefined, body)).toBe(false);
    expect(verifyKopoKopoSignature('test-secret', 'abc', body)).toBe(false);
  });

  it('rejects a multi-byte signature of the same length without throwing', () => {
    expect(verifyKopoKopoSignature('test-secret', 'é'.repeat(64), body)).toBe(false);
  });

  it('skips verification without a secret', () => {
    expect(verifyKopoKopoSignature('', undefined, body)).toBe(true);
  });
});
