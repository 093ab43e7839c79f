import { Room, RoomSummary } from '../entities/Room.js';

/**
 * Interface for room persistence
 */
export interface IRoomRepository {
  createRoom(name: string, description: string, createdBy: string): Room;

  getRoom(roomId: string): Room | null;

  findRoomByName(name: string): Room | null;

  listRoomsWithCounts(): RoomSummary[];

  /**
   * Deletes the room and, by cascade, its messages. Returns false when absent.
   */
  deleteRoom(roomId: string): boolean;

  deleteAllRooms(): number;
}
