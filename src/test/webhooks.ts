/**
 * Kopo Kopo callback bodies for tests
 */

export function incomingPaymentBody(orderId: string, status: string, amount = '1500.0'): string {
  return JSON.stringify({
    data: {
      id: 'evt-1',
      type: 'incoming_payment',
      attributes: {
        initiation_time: '2026-01-01T10:00:00+03:00',
        status,
        event: {
          type: 'Incoming Payment Request',
          resource: {
            id: 'res-1',
            reference: 'REF123',
            amount,
            status: status === 'Success' ? 'Received' : status,
            sender_phone_number: '+254712345678',
          },
          errors: null,
        },
        metadata: { order_id: orderId },
      },
    },
  });
}

export function tillPaymentBody(fields: {
  status: string;
  topic?: string;
  amount?: string;
  senderPhone?: string;
  hashedSenderPhone?: string;
}): string {
  return JSON.stringify({
    topic: fields.topic ?? 'buygoods_transaction_received',
    id: 'evt-2',
    event: {
      type: 'Buygoods Transaction',
      resource: {
        id: 'res-2',
        amount: fields.amount ?? '1500.0',
        status: fields.status,
        reference: 'TILL456',
        sender_phone_number: fields.senderPhone,
        hashed_sender_phone: fields.hashedSenderPhone,
      },
    },
  });
}
