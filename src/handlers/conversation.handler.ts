import { randomInt, randomUUID } from 'crypto';
import logger from '../config/logger';
import type { OrderRepository, UserRepository } from '../repositories/types';
import type { CatalogService } from '../services/catalog.service';
import { renderProductList } from '../services/catalog.service';
import { addToCart, cartTotal, formatCartLines, formatKes } from '../services/cart.service';
import type { FollowUpScheduler } from '../services/followup.scheduler';
import { shortOrderId } from '../services/notification.service';
import type { OrderLifecycleService } from '../services/order-lifecycle.service';
import type { SessionStore } from '../services/session.service';
import { Order, OrderStatus, Product } from '../types/order';
import { PaymentDispatcher, PaymentError } from '../types/payment';
import { DialogueState, Session, createSession } from '../types/session';
import type { ChatGateway } from '../types/whatsapp';
import { normalizeMobileNumber } from '../utils/phoneNormalizer';

export const RESET_KEYWORDS: ReadonlySet<string> = new Set([
  'hi',
  'hello',
  'start',
  'restart',
  'reset',
  'menu',
  '0',
]);
export const BROWSE_TRIGGERS: ReadonlySet<string> = new Set(['menu', 'order', 'browse', 'drinks', 'view_menu']);
export const SEARCH_MARKER = '__search__:';
export const RETRY_PAYMENT_PREFIX = 'retry_pay_';

export const BUTTON_IDS = {
  ADD_MORE: 'add_more',
  CHECKOUT: 'checkout',
  PAY_SELF: 'pay_self',
  PAY_OTHER: 'pay_other',
  VIEW_MENU: 'view_menu',
} as const;

const CHECKOUT_AFFORDANCES: ReadonlySet<string> = new Set([
  BUTTON_IDS.CHECKOUT,
  BUTTON_IDS.PAY_SELF,
  BUTTON_IDS.PAY_OTHER,
]);

export const MESSAGES = {
  EXPIRED_MENU: 'That menu is expired. Here is the latest one.',
  MENU_UNAVAILABLE: "Sorry, the menu isn't available right now. Please try again shortly.",
  INVALID_OPTION: "Invalid option. Please reply with the number (e.g., '1') or the name of the drink.",
  INVALID_QUANTITY: 'Please enter a valid number (e.g., 2)',
  NO_LONGER_AVAILABLE: 'Sorry, that drink is no longer available.',
  EMPTY_CART: 'Your cart is empty. Please add items first.',
  PAYMENT_PENDING:
    '⏳ You already have a payment pending. Please check your phone for the M-Pesa prompt and enter your PIN.',
  ASK_PAYMENT_PHONE: 'Please reply with the M-Pesa number to charge (e.g. 0712345678).',
  INVALID_PAYMENT_PHONE:
    "That doesn't look like a valid Safaricom or Airtel number. Please send it like 0712345678.",
  BUSY: '⚠️ Our payment system is busy right now. Please tap Checkout again in a moment.',
  BUSY_RETRY: '⚠️ Our payment system is busy right now. Please tap Retry Payment again in a moment.',
  FOLLOW_UP:
    "⏳ We're still waiting for your M-Pesa payment. If the prompt didn't show up, tap below to send it again.",
  ORDER_NOT_FOUND: "Sorry, we couldn't find that order. Type 'menu' to start a new one.",
  ORDER_CLOSED: "This order can no longer be paid. Type 'menu' to start a new order.",
  SOMETHING_WRONG: "Sorry, something went wrong. Please try again or type 'menu' to start over.",
  CHOOSE_CATEGORY: '🍹 Pick a category to see our drinks.',
} as const;

/**
 * Picks a product from the active (alphabetically sorted) list
 * Order: exact id, 1-based index, exact name, then first name containing the input
 */
export function resolveProduct(input: string, products: Product[]): Product | null {
  const query = input.trim();
  if (!query) {
    return null;
  }

  const byId = products.find((product) => product.id === query);
  if (byId) {
    return byId;
  }

  if (/^\d+$/.test(query)) {
    const index = parseInt(query, 10);
    return index >= 1 && index <= products.length ? products[index - 1] : null;
  }

  const lower = query.toLowerCase();
  return (
    products.find((product) => product.name.toLowerCase() === lower) ??
    products.find((product) => product.name.toLowerCase().includes(lower)) ??
    null
  );
}

function generatePickupCode(): string {
  return randomInt(1000, 10000).toString();
}

export interface ConversationDependencies {
  sessions: SessionStore;
  catalog: CatalogService;
  orders: OrderRepository;
  users: UserRepository;
  chat: ChatGateway;
  dispatcher: PaymentDispatcher;
  lifecycle: OrderLifecycleService;
  followUps: FollowUpScheduler;
  barName: string;
}

/**
 * ConversationHandler runs the ordering dialogue, one inbound message at a time
 */
export class ConversationHandler {
  constructor(private readonly deps: ConversationDependencies) {}

  /**
   * Main entry point for handling incoming messages
   * For button and list replies, `text` is the reply id
   */
  async handleIncomingMessage(
    phone: string,
    text: string,
    messageType: 'text' | 'interactive' = 'text'
  ): Promise<void> {
    const input = text.trim();
    const command = input.toLowerCase();

    logger.info(`Handling message from ${phone}:`, { type: messageType, body: input });

    try {
      if (RESET_KEYWORDS.has(command)) {
        const session = createSession();
        await this.deps.sessions.set(phone, session);
        await this.showCategories(
          phone,
          session,
          `🍹 Welcome to ${this.deps.barName}!\n\nPick a category below to see our drinks.`
        );
        return;
      }

      if (input.startsWith(RETRY_PAYMENT_PREFIX)) {
        await this.handleRetryPayment(phone, input.slice(RETRY_PAYMENT_PREFIX.length));
        return;
      }

      const session = (await this.deps.sessions.get(phone)) ?? createSession();

      switch (session.state) {
        case DialogueState.START:
          await this.handleStart(phone, session, input, command);
          break;
        case DialogueState.BROWSING:
          await this.handleBrowsing(phone, session, input);
          break;
        case DialogueState.SELECTING_PRODUCT:
          await this.handleSelectingProduct(phone, session, input);
          break;
        case DialogueState.QUANTITY:
          await this.handleQuantity(phone, session, input);
          break;
        case DialogueState.CONFIRM_ORDER:
          await this.handleConfirmOrder(phone, session, command);
          break;
        case DialogueState.WAITING_FOR_PAYMENT_PHONE:
          await this.handleWaitingForPaymentPhone(phone, session, input);
          break;
        default: {
          const unreachable: never = session.state;
          throw new Error(`Unhandled dialogue state: ${String(unreachable)}`);
        }
      }
    } catch (error) {
      logger.error('ConversationHandler error:', {
        error: error instanceof Error ? error.message : 'Unknown error',
        stack: error instanceof Error ? error.stack : undefined,
        phone,
        body: input,
      });

      try {
        await this.deps.chat.sendText(phone, MESSAGES.SOMETHING_WRONG);
      } catch (sendError) {
        logger.error('Failed to send error message:', sendError);
      }

      throw error;
    }
  }

  /**
   * Sends the category list and moves to BROWSING
   */
  private async showCategories(phone: string, session: Session, intro: string): Promise<void> {
    const view = await this.deps.catalog.getView();

    if (view.categories.length === 0) {
      await this.deps.chat.sendText(phone, MESSAGES.MENU_UNAVAILABLE);
      session.state = DialogueState.START;
      await this.deps.sessions.set(phone, session);
      return;
    }

    await this.deps.chat.sendList(phone, intro, 'View Menu', [
      {
        title: 'Categories',
        rows: view.categories.map((category) => ({ id: category, title: category })),
      },
    ]);

    session.state = DialogueState.BROWSING;
    session.currentCategory = '';
    session.currentProductId = '';
    await this.deps.sessions.set(phone, session);
  }

  private async handleStart(phone: string, session: Session, input: string, command: string): Promise<void> {
    if (!input || command.split(/\s+/).some((word) => BROWSE_TRIGGERS.has(word))) {
      await this.showCategories(phone, session, MESSAGES.CHOOSE_CATEGORY);
      return;
    }

    // A second tap on a checkout button after the order was placed
    if (CHECKOUT_AFFORDANCES.has(command)) {
      if (await this.hasPendingOrder(session)) {
        await this.deps.chat.sendText(phone, MESSAGES.PAYMENT_PENDING);
        return;
      }
      await this.showCategories(phone, session, MESSAGES.CHOOSE_CATEGORY);
      return;
    }

    await this.searchProducts(phone, session, input);
  }

  private async searchProducts(phone: string, session: Session, query: string): Promise<void> {
    const results = await this.deps.catalog.search(query);

    if (results.length === 0) {
      await this.deps.chat.sendButtons(phone, `😕 Sorry, we couldn't find "${query}" on the menu.`, [
        { id: BUTTON_IDS.VIEW_MENU, title: 'View Full Menu' },
      ]);
      await this.deps.sessions.set(phone, session);
      return;
    }

    await this.deps.chat.sendText(phone, renderProductList(`🔍 Results for "${query}":`, results));

    session.currentCategory = `${SEARCH_MARKER}${query}`;
    session.currentProductId = '';
    session.state = DialogueState.SELECTING_PRODUCT;
    await this.deps.sessions.set(phone, session);
  }

  private async handleBrowsing(phone: string, session: Session, input: string): Promise<void> {
    const view = await this.deps.catalog.getView();

    if (!view.categories.includes(input)) {
      await this.deps.chat.sendText(phone, MESSAGES.EXPIRED_MENU);
      await this.showCategories(phone, session, MESSAGES.CHOOSE_CATEGORY);
      return;
    }

    await this.deps.chat.sendText(phone, renderProductList(`*${input}*`, view.productsByCategory[input] ?? []));

    session.currentCategory = input;
    session.currentProductId = '';
    session.state = DialogueState.SELECTING_PRODUCT;
    await this.deps.sessions.set(phone, session);
  }

  /**
   * Products the customer is choosing from: a category, or a search re-run
   */
  private async activeProducts(session: Session): Promise<Product[]> {
    if (session.currentCategory.startsWith(SEARCH_MARKER)) {
      return this.deps.catalog.search(session.currentCategory.slice(SEARCH_MARKER.length));
    }

    const view = await this.deps.catalog.getView();
    return view.categories.includes(session.currentCategory)
      ? view.productsByCategory[session.currentCategory] ?? []
      : [];
  }

  private async handleSelectingProduct(phone: string, session: Session, input: string): Promise<void> {
    const products = await this.activeProducts(session);

    if (products.length === 0) {
      await this.deps.chat.sendText(phone, MESSAGES.EXPIRED_MENU);
      await this.showCategories(phone, session, MESSAGES.CHOOSE_CATEGORY);
      return;
    }

    const product = resolveProduct(input, products);

    if (!product) {
      await this.deps.chat.sendText(phone, MESSAGES.INVALID_OPTION);
      return;
    }

    if (product.stockQuantity <= 0) {
      await this.deps.chat.sendText(
        phone,
        `Sorry, *${product.name}* is out of stock. Please choose another drink.`
      );
      return;
    }

    await this.deps.chat.sendText(
      phone,
      `You selected: *${product.name}*\nPrice: ${formatKes(product.price)}\n\nHow many would you like? (Enter a number)`
    );

    session.currentProductId = product.id;
    session.state = DialogueState.QUANTITY;
    await this.deps.sessions.set(phone, session);
  }

  private async handleQuantity(phone: string, session: Session, input: string): Promise<void> {
    const quantity = /^\d+$/.test(input) ? parseInt(input, 10) : NaN;

    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      await this.deps.chat.sendText(phone, MESSAGES.INVALID_QUANTITY);
      return;
    }

    const product = session.currentProductId
      ? await this.deps.catalog.getById(session.currentProductId)
      : null;

    if (!product || !product.isActive) {
      await this.deps.chat.sendText(phone, MESSAGES.NO_LONGER_AVAILABLE);
      await this.showCategories(phone, session, MESSAGES.CHOOSE_CATEGORY);
      return;
    }

    if (quantity > product.stockQuantity) {
      await this.deps.chat.sendText(
        phone,
        `Sorry, only ${product.stockQuantity} available in stock. Please enter a smaller quantity.`
      );
      return;
    }

    session.cart = addToCart(session.cart, product, quantity);

    await this.deps.chat.sendButtons(
      phone,
      `✅ Added to cart:\n${product.name} x${quantity} = ${formatKes(product.price * quantity)}\n\n` +
        this.cartSummary(session),
      [
        { id: BUTTON_IDS.ADD_MORE, title: 'Add More' },
        { id: BUTTON_IDS.CHECKOUT, title: 'Checkout' },
      ]
    );

    session.currentProductId = '';
    session.state = DialogueState.CONFIRM_ORDER;
    await this.deps.sessions.set(phone, session);
  }

  private cartSummary(session: Session): string {
    return `🛒 *Your cart:*\n${formatCartLines(session.cart)}\n\nCart total: ${formatKes(cartTotal(session.cart))}`;
  }

  private async handleConfirmOrder(phone: string, session: Session, command: string): Promise<void> {
    if (command === BUTTON_IDS.ADD_MORE || command.includes('add more')) {
      await this.showCategories(phone, session, MESSAGES.CHOOSE_CATEGORY);
      return;
    }

    if (command === BUTTON_IDS.CHECKOUT || command.includes('checkout')) {
      await this.checkout(phone, session);
      return;
    }

    if (command === BUTTON_IDS.PAY_SELF) {
      await this.createOrder(phone, session, phone);
      return;
    }

    if (command === BUTTON_IDS.PAY_OTHER) {
      await this.deps.chat.sendText(phone, MESSAGES.ASK_PAYMENT_PHONE);
      session.state = DialogueState.WAITING_FOR_PAYMENT_PHONE;
      await this.deps.sessions.set(phone, session);
      return;
    }

    await this.deps.chat.sendButtons(phone, `Please choose an option below.\n\n${this.cartSummary(session)}`, [
      { id: BUTTON_IDS.ADD_MORE, title: 'Add More' },
      { id: BUTTON_IDS.CHECKOUT, title: 'Checkout' },
    ]);
  }

  /**
   * True while the session's order still awaits payment; clears a stale marker otherwise
   */
  private async hasPendingOrder(session: Session): Promise<boolean> {
    if (!session.pendingOrderId) {
      return false;
    }

    const order = await this.deps.orders.getById(session.pendingOrderId);
    if (order && order.status === OrderStatus.PENDING) {
      return true;
    }

    session.pendingOrderId = '';
    return false;
  }

  private async checkout(phone: string, session: Session): Promise<void> {
    if (session.cart.length === 0) {
      await this.deps.chat.sendText(phone, MESSAGES.EMPTY_CART);
      return;
    }

    if (await this.hasPendingOrder(session)) {
      await this.deps.chat.sendText(phone, MESSAGES.PAYMENT_PENDING);
      return;
    }

    await this.deps.chat.sendButtons(
      phone,
      `🧾 *Order summary*\n\n${formatCartLines(session.cart)}\n\n` +
        `*Total: ${formatKes(cartTotal(session.cart))}*\n\nWhich M-Pesa number should we charge?`,
      [
        { id: BUTTON_IDS.PAY_SELF, title: 'Use My Number' },
        { id: BUTTON_IDS.PAY_OTHER, title: 'Different Number' },
      ]
    );

    session.state = DialogueState.CONFIRM_ORDER;
    await this.deps.sessions.set(phone, session);
  }

  private async handleWaitingForPaymentPhone(phone: string, session: Session, input: string): Promise<void> {
    const paymentPhone = normalizeMobileNumber(input);

    if (!paymentPhone) {
      await this.deps.chat.sendText(phone, MESSAGES.INVALID_PAYMENT_PHONE);
      return;
    }

    await this.createOrder(phone, session, paymentPhone);
  }

  /**
   * Persists the order and queues the STK push
   * Sends nothing on success; the M-Pesa prompt is the customer's confirmation
   */
  private async createOrder(phone: string, session: Session, paymentPhone: string): Promise<void> {
    if (session.cart.length === 0) {
      await this.deps.chat.sendText(phone, MESSAGES.EMPTY_CART);
      return;
    }

    if (await this.hasPendingOrder(session)) {
      await this.deps.chat.sendText(phone, MESSAGES.PAYMENT_PENDING);
      return;
    }

    const user = await this.deps.users.getOrCreateByPhone(phone);

    const order: Order = {
      id: randomUUID(),
      userId: user.id,
      customerPhone: paymentPhone,
      tableNumber: '',
      totalAmount: cartTotal(session.cart),
      status: OrderStatus.PENDING,
      paymentMethod: 'MPESA',
      paymentReference: '',
      pickupCode: generatePickupCode(),
      items: session.cart.map((item) => ({
        productId: item.productId,
        productName: item.name,
        quantity: item.quantity,
        priceAtTime: item.price,
      })),
      createdAt: new Date(),
      readyAt: null,
      readyBy: null,
      completedAt: null,
      completedBy: null,
    };

    await this.deps.orders.create(order);

    // Marker goes in before dispatch
    session.pendingOrderId = order.id;
    await this.deps.sessions.set(phone, session);

    try {
      this.deps.dispatcher.enqueue(order.id, paymentPhone, order.totalAmount);
    } catch (error) {
      if (!(error instanceof PaymentError)) {
        throw error;
      }

      logger.warn(`Could not queue payment for order ${order.id}: ${error.message}`);
      await this.deps.lifecycle.markFailed(order.id, false);

      session.pendingOrderId = '';
      session.state = DialogueState.CONFIRM_ORDER;
      await this.deps.sessions.set(phone, session);

      await this.deps.chat.sendText(phone, MESSAGES.BUSY);
      return;
    }

    session.cart = [];
    session.currentCategory = '';
    session.currentProductId = '';
    session.state = DialogueState.START;
    await this.deps.sessions.set(phone, session);

    this.scheduleFollowUp(order.id, phone);
  }

  private scheduleFollowUp(orderId: string, phone: string): void {
    this.deps.followUps.schedule(orderId, async () => {
      const order = await this.deps.orders.getById(orderId);
      if (!order || order.status !== OrderStatus.PENDING) {
        return;
      }

      logger.info(`Order ${orderId} still pending, offering a retry`);
      await this.deps.chat.sendButtons(phone, MESSAGES.FOLLOW_UP, [
        { id: `${RETRY_PAYMENT_PREFIX}${orderId}`, title: 'Retry Payment' },
      ]);
    });
  }

  private async handleRetryPayment(phone: string, orderId: string): Promise<void> {
    const order = orderId ? await this.deps.orders.getById(orderId) : null;

    if (!order) {
      await this.deps.chat.sendText(phone, MESSAGES.ORDER_NOT_FOUND);
      return;
    }

    switch (order.status) {
      case OrderStatus.PENDING:
        break;
      case OrderStatus.FAILED:
        await this.deps.chat.sendText(phone, MESSAGES.ORDER_CLOSED);
        return;
      case OrderStatus.PAID:
      case OrderStatus.READY:
      case OrderStatus.COMPLETED:
        await this.deps.chat.sendText(
          phone,
          `✅ Order #${shortOrderId(order.id)} is already paid. Your pickup code is *${order.pickupCode}*.`
        );
        return;
    }

    try {
      this.deps.dispatcher.enqueue(order.id, order.customerPhone, order.totalAmount);
    } catch (error) {
      if (!(error instanceof PaymentError)) {
        throw error;
      }
      logger.warn(`Could not queue payment retry for order ${order.id}: ${error.message}`);
      await this.deps.chat.sendText(phone, MESSAGES.BUSY_RETRY);
      return;
    }

    const session = (await this.deps.sessions.get(phone)) ?? createSession();
    session.pendingOrderId = order.id;
    await this.deps.sessions.set(phone, session);

    this.scheduleFollowUp(order.id, phone);
  }
}
