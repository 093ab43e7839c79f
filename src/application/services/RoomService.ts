import { IRoomRepository } from '../../core/interfaces/IRoomRepository.js';
import { IMessageRepository } from '../../core/interfaces/IMessageRepository.js';
import { IUserRepository } from '../../core/interfaces/IUserRepository.js';
import { MessageView } from '../../core/entities/Message.js';
import { Room, RoomList, RoomSummary, RoomWithMessages } from '../../core/entities/Room.js';
import {
  MessageViewListSchema,
  RoomListSchema,
  RoomWithMessagesSchema,
} from '../../core/entities/schemas.js';
import { ROOM_LIST_KEY, roomKey, roomMessagesKey } from '../../core/cacheKeys.js';
import {
  ConflictError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  errorMessage,
} from '../../core/errors.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { CacheService } from './CacheService.js';
import { toMessageViews } from './messageViews.js';

export interface RoomServiceOptions {
  displayLimit: number; // default size of a room's message listing
  previewLimit: number; // messages embedded in a single-room view
}

/**
 * Room reads through the cache and the room writes that invalidate it
 */
export class RoomService {
  constructor(
    private roomRepo: IRoomRepository,
    private messageRepo: IMessageRepository,
    private userRepo: IUserRepository,
    private cache: CacheService,
    private options: RoomServiceOptions = { displayLimit: 50, previewLimit: 10 },
    private logger: Logger = silentLogger
  ) {}

  /**
   * Name uniqueness is checked here, not enforced by the store
   */
  async createRoom(name: string, description: string, createdBy: string): Promise<RoomSummary> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError('Room name must not be empty');
    }
    if (this.roomRepo.findRoomByName(trimmed)) {
      throw new ConflictError(`A room named "${trimmed}" already exists`);
    }

    let room: Room;
    try {
      room = this.roomRepo.createRoom(trimmed, description, createdBy);
    } catch (error) {
      throw new PersistenceError(`Could not create room: ${errorMessage(error)}`, error);
    }

    const invalidated = await this.cache.invalidateRoomSet();
    if (!invalidated.ok) {
      this.logger.warn(`room list invalidation failed: ${invalidated.error.message}`);
    }

    this.logger.debug(`created room ${room.id}`);
    return { ...room, messageCount: 0 };
  }

  /**
   * Room with its last `previewLimit` messages, oldest first
   */
  getRoom(roomId: string): Promise<RoomWithMessages> {
    return this.cache.getOrLoad<RoomWithMessages>(
      roomKey(roomId),
      () => {
        const room = this.roomRepo.getRoom(roomId);
        if (!room) {
          throw new NotFoundError('Room', roomId);
        }
        const recent = this.messageRepo.listMessages(roomId, this.options.previewLimit, 'asc');
        return {
          ...room,
          messageCount: this.messageRepo.countMessages(roomId),
          messages: toMessageViews(recent, this.userRepo),
        };
      },
      RoomWithMessagesSchema
    );
  }

  /**
   * All rooms with message counts, newest room first
   */
  listRooms(): Promise<RoomList> {
    return this.cache.getOrLoad<RoomList>(
      ROOM_LIST_KEY,
      () => {
        const rooms = this.roomRepo.listRoomsWithCounts();
        return { rooms, count: rooms.length };
      },
      RoomListSchema
    );
  }

  /**
   * The most recent `limit` messages of a room, newest first.
   * Listings up to the display limit are served from one cached entry.
   */
  async listRoomMessages(
    roomId: string,
    limit: number = this.options.displayLimit
  ): Promise<MessageView[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('limit must be a positive integer');
    }

    const load = (count: number): MessageView[] => {
      if (!this.roomRepo.getRoom(roomId)) {
        throw new NotFoundError('Room', roomId);
      }
      return toMessageViews(this.messageRepo.listMessages(roomId, count, 'desc'), this.userRepo);
    };

    if (limit > this.options.displayLimit) {
      return load(limit);
    }

    const messages = await this.cache.getOrLoad<MessageView[]>(
      roomMessagesKey(roomId),
      () => load(this.options.displayLimit),
      MessageViewListSchema
    );
    return messages.slice(0, limit);
  }

  async deleteRoom(roomId: string): Promise<void> {
    let deleted: boolean;
    try {
      deleted = this.roomRepo.deleteRoom(roomId);
    } catch (error) {
      throw new PersistenceError(`Could not delete room: ${errorMessage(error)}`, error);
    }
    if (!deleted) {
      throw new NotFoundError('Room', roomId);
    }

    this.cache.reportFailures(await this.cache.invalidateRoom(roomId));
    this.logger.debug(`deleted room ${roomId}`);
  }

  /**
   * Maintenance: removes every room and its messages
   */
  async deleteAllRooms(): Promise<number> {
    let roomIds: string[];
    let deleted: number;
    try {
      roomIds = this.roomRepo.listRoomsWithCounts().map((room) => room.id);
      deleted = this.roomRepo.deleteAllRooms();
    } catch (error) {
      throw new PersistenceError(`Could not delete rooms: ${errorMessage(error)}`, error);
    }

    for (const roomId of roomIds) {
      this.cache.reportFailures(await this.cache.invalidateRoom(roomId));
    }
    const invalidated = await this.cache.invalidateRoomSet();
    if (!invalidated.ok) {
      this.logger.warn(`room list invalidation failed: ${invalidated.error.message}`);
    }

    this.logger.info(`deleted ${deleted} room(s)`);
    return deleted;
  }
}
