/**
 * DialogueState is the position of a customer in the ordering conversation
 */
export enum DialogueState {
  START = 'START',
  BROWSING = 'BROWSING',
  SELECTING_PRODUCT = 'SELECTING_PRODUCT',
  QUANTITY = 'QUANTITY',
  CONFIRM_ORDER = 'CONFIRM_ORDER',
  WAITING_FOR_PAYMENT_PHONE = 'WAITING_FOR_PAYMENT_PHONE',
}

const DIALOGUE_STATES: ReadonlySet<string> = new Set(Object.values(DialogueState));

function isDialogueState(value: string): value is DialogueState {
  return DIALOGUE_STATES.has(value);
}

/**
 * Maps a persisted state value to a known state
 * Anything unrecognised (legacy or corrupted sessions) restarts the conversation
 */
export function parseDialogueState(value: unknown): DialogueState {
  if (typeof value === 'string' && isDialogueState(value)) {
    return value;
  }
  return DialogueState.START;
}

/**
 * CartItem captures name and price when the item was added,
 * so later catalog price changes do not touch an open cart
 */
export interface CartItem {
  productId: string;
  quantity: number;
  name: string;
  price: number;
}

/**
 * Session represents the conversation state stored per customer phone
 */
export interface Session {
  state: DialogueState;
  currentCategory: string;
  currentProductId: string;
  cart: CartItem[];
  pendingOrderId: string;
}

export function createSession(): Session {
  return {
    state: DialogueState.START,
    currentCategory: '',
    currentProductId: '',
    cart: [],
    pendingOrderId: '',
  };
}
