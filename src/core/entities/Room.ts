import type { MessageView } from './Message.js';

/**
 * Room domain entity
 */
export interface Room {
  id: string;
  name: string;
  description: string;
  createdBy: string;
  createdAt: string;
}

export interface RoomSummary extends Room {
  messageCount: number;
}

export interface RoomList {
  rooms: RoomSummary[];
  count: number;
}

export interface RoomWithMessages extends RoomSummary {
  messages: MessageView[];
}
