import { describe, it, expect, beforeEach } from 'vitest';
import { WhatsAppController, extractInboundMessages } from './whatsapp.controller';
import { ConversationHandler } from '../handlers/conversation.handler';
import { StaffActionHandler } from '../handlers/staff.handler';
import { CatalogService } from '../services/catalog.service';
import { FollowUpScheduler } from '../services/followup.scheduler';
import { InventoryService } from '../services/inventory.service';
import { OperationsFeed } from '../services/operations-feed';
import { OrderLifecycleService } from '../services/order-lifecycle.service';
import { OrderNotificationService } from '../services/notification.service';
import { InMemorySessionStore } from '../services/session.service';
import { OrderStatus } from '../types/order';
import { DialogueState } from '../types/session';
import type { WaMessage, WaWebhookPayload } from '../types/whatsapp';
import {
  FakeDispatcher,
  InMemoryOrderRepository,
  InMemoryProductRepository,
  InMemoryUserRepository,
  RecordingChatGateway,
  makeOrder,
  makeProduct,
} from '../test/fakes';

function payloadWith(messages: WaMessage[]): WaWebhookPayload {
  return {
    entry: [
      {
        changes: [
          {
            value: {
              contacts: [{ profile: { name: 'Wanjiru' }, wa_id: '254712345678' }],
              messages,
            },
          },
        ],
      },
    ],
  };
}

describe('extractInboundMessages', () => {
  it('takes the body of a text message', () => {
    const inbound = extractInboundMessages(
      payloadWith([
        { from: '254712345678', id: 'wamid.1', type: 'text', text: { body: ' Hi ' } },
      ])
    );

    expect(inbound).toEqual([
      { messageId: 'wamid.1', phone: '254712345678', text: ' Hi ', messageType: 'text', contactName: 'Wanjiru' },
    ]);
  });

  it('takes the reply id of button and list replies', () => {
    const inbound = extractInboundMessages(
      payloadWith([
        {
          from: '254712345678',
          id: 'wamid.2',
         
          type: 'interactive',
          interactive: { type: 'button_reply', button_reply: { id: 'checkout' } },
        },
        {
          from: '254712345678',
          id: 'wamid.3',
         
          type: 'interactive',
          interactive: { type: 'list_reply', list_reply: { id: 'Beers' } },
        },
      ])
    );

    expect(inbound.map((message) => [message.text, message.messageType])).toEqual([
      ['checkout', 'interactive'],
      ['Beers', 'interactive'],
    ]);
  });

  it('skips status updates and media', () => {
    const statusOnly: WaWebhookPayload = {
      entry: [{ changes: [{ value: { contacts: [{ wa_id: '254712345678' }] } }] }],
    };

    expect(extractInboundMessages(statusOnly)).toEqual([]);
    expect(
      extractInboundMessages(
        payloadWith([{ from: '254712345678', id: 'wamid.4', type: 'image' }])
      )
    ).toEqual([]);
  });
});

describe('WhatsAppController.processMessages', () => {
  const STAFF = '254700000001';
  let orders: InMemoryOrderRepository;
  let sessions: InMemorySessionStore;
  let chat: RecordingChatGateway;
  let read: string[];
  let controller: WhatsAppController;

  beforeEach(() => {
    orders = new InMemoryOrderRepository();
    sessions = new InMemorySessionStore(7200);
    chat = new RecordingChatGateway();
    read = [];
    const lifecycle = new OrderLifecycleService(
      orders,
      new OrderNotificationService(chat, new OperationsFeed(), [STAFF])
    );
    const conversation = new ConversationHandler({
      sessions,
      catalog: new CatalogService(
        new InMemoryProductRepository([makeProduct({ id: 'p-1', name: 'Tusker', category: 'Beers' })])
      ),
      orders,
      users: new InMemoryUserRepository(),
      chat,
      dispatcher: new FakeDispatcher(),
      lifecycle,
      followUps: new FollowUpScheduler(),
      barName: 'Test Bar',
    });

    controller = new WhatsAppController({
      verifyToken: 'test-verify-token',
      conversation,
      staff: new StaffActionHandler(
        lifecycle,
        new InventoryService(new InMemoryProductRepository(), new OperationsFeed()),
        chat,
        [STAFF]
      ),
      receipts: {
        markAsRead: async (messageId: string) => {
          read.push(messageId);
        },
      },
    });
  });

  it('routes staff buttons to the staff handler', async () => {
    await orders.create(makeOrder({ id: 'ord12345-aaaa', status: OrderStatus.PAID }));

    await controller.processMessages([
      { messageId: 'wamid.1', phone: STAFF, text: 'ready_ord12345-aaaa', messageType: 'interactive' },
    ]);

    expect((await orders.getById('ord12345-aaaa'))?.status).toBe(OrderStatus.READY);
    expect(await sessions.get(STAFF)).toBeNull();
    expect(read).toEqual(['wamid.1']);
  });

  it('hands customer messages to the dialogue', async () => {
    await controller.processMessages([
      { messageId: 'wamid.2', phone: '254712345678', text: 'hi', messageType: 'text' },
    ]);

    expect((await sessions.get('254712345678'))?.state).toBe(DialogueState.BROWSING);
  });

  it('keeps going after a failed message', async () => {
    chat.failFor.add('254711111111');

    await controller.processMessages([
      { messageId: 'wamid.3', phone: '254711111111', text: 'hi', messageType: 'text' },
      { messageId: 'wamid.4', phone: '254712345678', text: 'hi', messageType: 'text' },
    ]);

    expect((await sessions.get('254712345678'))?.state).toBe(DialogueState.BROWSING);
    expect(read).toEqual(['wamid.3', 'wamid.4']);
  });
});
