/**
 * The slice of the MAX Bot API the moderation runtime calls. `bot.ts` adapts
 * `bot.api` to it; tests hand in a plain object.
 */
export interface MaxChatApi {
  deleteMessage(messageId: string): Promise<unknown>;
  sendMessageToChat(chatId: number, text: string): Promise<unknown>;
  getChatAdmins(chatId: number): Promise<unknown>;
  getChatMembers(chatId: number, userIds: number[]): Promise<unknown>;
  removeChatMember(chatId: number, userId: number, block: boolean): Promise<unknown>;
}

export interface ChatMemberLike {
  user_id: number;
  is_admin?: boolean;
  is_owner?: boolean;
}

function isChatMember(value: unknown): value is ChatMemberLike {
  return typeof value === 'object'
    && value !== null
    && 'user_id' in value
    && typeof value.user_id === 'number';
}

/** Pulls `members` out of a getChatAdmins/getChatMembers response. */
export function readMembers(response: unknown): ChatMemberLike[] {
  if (typeof response !== 'object' || response === null || !('members' in response)) {
    return [];
  }

  const { members } = response;
  return Array.isArray(members) ? members.filter(isChatMember) : [];
}

export function isPrivileged(member: ChatMemberLike | undefined): boolean {
  return Boolean(member?.is_admin || member?.is_owner);
}

export function isMessageAlreadyDeleted(status: number | undefined, message: string): boolean {
  if (status === 404) {
    return true;
  }

  const normalized = message.toLowerCase();
  return normalized.includes('not found') || normalized.includes('already deleted');
}
