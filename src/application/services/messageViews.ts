import { AI_DISPLAY_NAME, ConversationEntry, Message, MessageView } from '../../core/entities/Message.js';
import { IUserRepository } from '../../core/interfaces/IUserRepository.js';

export const UNKNOWN_AUTHOR = 'Unknown user';

/**
 * Attaches author display names; machine-generated messages read as the assistant
 */
export function toMessageViews(messages: Message[], users: IUserRepository): MessageView[] {
  const authorIds = messages.flatMap((m) =>
    m.messageType === 'user' && m.userId !== null ? [m.userId] : []
  );
  const authors = users.getUsers(authorIds);

  return messages.map((message) => ({
    ...message,
    username:
      message.messageType === 'ai' || message.userId === null
        ? AI_DISPLAY_NAME
        : authors.get(message.userId)?.username ?? UNKNOWN_AUTHOR,
  }));
}

export function toConversationEntry(view: MessageView): ConversationEntry {
  return { speaker: view.username, text: view.content };
}
