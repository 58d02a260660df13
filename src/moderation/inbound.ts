import { IncomingMessage, InboundMessage } from '../types';

export interface InboundContext {
  chatId?: number | null;
  myId?: number;
}

/**
 * Narrows a raw MAX update to a group message the dispatcher can judge.
 * Dialogs, bot senders and the bot's own posts yield null. Forwarded text
 * rides along as the caption so it is scored with the message; quoted reply
 * text does not.
 */
export function toInboundMessage(message: IncomingMessage | undefined, context: InboundContext = {}): InboundMessage | null {
  if (!message) return null;

  const chatType = message.recipient?.chat_type;
  if (chatType !== 'chat' && chatType !== 'channel') return null;

  const chatId = message.recipient.chat_id ?? context.chatId;
  const userId = message.sender?.user_id;
  const messageId = message.body?.mid;

  if (!chatId || !userId || !messageId) {
    return null;
  }

  if (message.sender?.is_bot || userId === context.myId) {
    return null;
  }

  const linkedText = message.link?.type === 'forward' ? message.link.message?.text : undefined;
  const userName = message.sender?.name?.trim() || message.sender?.username?.trim() || undefined;

  return {
    chatId,
    userId,
    messageId,
    text: message.body.text ?? '',
    ...(typeof linkedText === 'string' && linkedText !== '' ? { caption: linkedText } : {}),
    ...(userName ? { userName } : {}),
  };
}
