export const ROOM_LIST_KEY = 'room-list';

export function roomKey(roomId: string): string {
  return `room:${roomId}`;
}

export function roomMessagesKey(roomId: string): string {
  return `room:${roomId}:messages`;
}
