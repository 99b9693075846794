export type ProviderName = 'telegram';

/**
 * Called once per accepted inbound message. `conversationId` is the raw
 * platform chat id; replies go back through `MessagingProvider.send`.
 */
export type InboundHandler = (
  senderId: string,
  conversationId: string,
  text: string,
  imagesBase64: string[]
) => Promise<void>;

export interface MessagingProvider {
  readonly name: ProviderName;
  start(handler: InboundHandler): Promise<void>;
  stop(): Promise<void>;
  /** Deliver `text`, split as the platform requires. Rejects when delivery fails. */
  send(conversationId: string, text: string): Promise<void>;
  getBotUsername(): string;
}

export function conversationKey(provider: ProviderName, conversationId: string): string {
  return `${provider}:${conversationId}`;
}
