/**
 * Message domain entity
 */
export type MessageType = 'user' | 'ai';

export const AI_DISPLAY_NAME = 'AI Assistant';

export interface Message {
  id: string;
  roomId: string;
  userId: string | null; // null for machine-generated replies
  content: string;
  messageType: MessageType;
  createdAt: string; // ISO-8601, millisecond precision
}

export interface NewMessage {
  roomId: string;
  userId: string | null;
  content: string;
  messageType: MessageType;
}

/**
 * Message with its author's display name resolved
 */
export interface MessageView extends Message {
  username: string;
}

/**
 * One line of a conversation window, oldest first
 */
export interface ConversationEntry {
  speaker: string;
  text: string;
}

export type SortOrder = 'asc' | 'desc';
