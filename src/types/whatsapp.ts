/**
 * WhatsApp Cloud API types, limited to the fields the bot reads or sends
 */

/**
 * Inbound webhook: entry → changes → value
 */
export interface WaWebhookPayload {
  entry: Array<{
    changes: Array<{ value: WaWebhookValue }>;
  }>;
}

/**
 * Status-only updates carry no messages
 */
export interface WaWebhookValue {
  contacts?: WaContact[];
  messages?: WaMessage[];
}

export interface WaContact {
  profile?: {
    name: string;
  };
  wa_id: string;
}

export interface WaMessage {
  from: string;
  id: string;
  type: 'text' | 'interactive' | 'button' | 'image' | 'video' | 'audio' | 'document' | 'location';
  text?: {
    body: string;
  };
  interactive?: {
    type: 'button_reply' | 'list_reply';
    button_reply?: { id: string };
    list_reply?: { id: string };
  };
  button?: {
    payload: string;
    text: string;
  };
}

/**
 * Send response; only the message id is used
 */
export interface WaApiResponse {
  messages?: Array<{
    id: string;
  }>;
}

export interface WaButton {
  id: string;
  title: string;
}

export interface WaListRow {
  id: string;
  title: string;
  description?: string;
}

export interface WaListSection {
  title: string;
  rows: WaListRow[];
}

export interface WaServiceResponse {
  messageId: string;
}

/**
 * Outbound chat operations the bot depends on
 */
export interface ChatGateway {
  sendText(to: string, body: string): Promise<WaServiceResponse>;
  sendButtons(to: string, body: string, buttons: WaButton[]): Promise<WaServiceResponse>;
  sendList(
    to: string,
    body: string,
    buttonText: string,
    sections: WaListSection[]
  ): Promise<WaServiceResponse>;
}

/**
 * Inbound message reduced to what the dialogue needs
 * For button and list replies, text is the reply id
 */
export interface InboundMessage {
  messageId: string;
  phone: string;
  text: string;
  messageType: 'text' | 'interactive';
  contactName?: string;
}
