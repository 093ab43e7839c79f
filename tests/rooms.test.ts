import { RoomService } from '../src/application/services/RoomService.js';
import { ConflictError, NotFoundError, PersistenceError, ValidationError } from '../src/core/errors.js';
import { ROOM_LIST_KEY, roomKey, roomMessagesKey } from '../src/core/cacheKeys.js';
import { MemoryCacheClient } from '../src/infrastructure/cache/MemoryCacheClient.js';
import { createTestContext, FailingCacheClient, TestContext } from './helpers.js';

describe('RoomService', () => {
  let ctx: TestContext;
  let service: RoomService;
  let aliceId: string;

  beforeEach(() => {
    ctx = createTestContext(new MemoryCacheClient());
    service = new RoomService(ctx.rooms, ctx.messages, ctx.users, ctx.cache);
    aliceId = ctx.users.createUser('alice').id;
  });

  afterEach(() => {
    ctx.connection.close();
  });

  test('a new room shows up in a previously cached room list', async () => {
    await expect(service.listRooms()).resolves.toEqual({ rooms: [], count: 0 });
    await expect(ctx.cacheClient.get(ROOM_LIST_KEY)).resolves.toBe('{"rooms":[],"count":0}');

    const room = await service.createRoom('General', 'Chat', aliceId);

    const list = await service.listRooms();
    expect(list.count).toBe(1);
    expect(list.rooms[0]).toEqual({ ...room, messageCount: 0 });
  });

  test('rejects blank and duplicate names', async () => {
    await service.createRoom('General', '', aliceId);

    await expect(service.createRoom('   ', '', aliceId)).rejects.toBeInstanceOf(ValidationError);
    await expect(service.createRoom('GENERAL', '', aliceId)).rejects.toBeInstanceOf(ConflictError);
  });

  test('getRoom embeds the latest messages oldest first', async () => {
    const room = await service.createRoom('General', '', aliceId);
    for (let i = 1; i <= 12; i++) {
      ctx.messages.insertMessage({ roomId: room.id, userId: aliceId, content: `m${i}`, messageType: 'user' });
    }

    const view = await service.getRoom(room.id);
    expect(view.messageCount).toBe(12);
    expect(view.messages.map((m) => m.content)).toEqual([
      'm3', 'm4', 'm5', 'm6', 'm7', 'm8', 'm9', 'm10', 'm11', 'm12',
    ]);
    expect(view.messages[0].username).toBe('alice');
    await expect(ctx.cacheClient.get(roomKey(room.id))).resolves.not.toBeNull();
  });

  test('getRoom reports unknown rooms without caching them', async () => {
    await expect(service.getRoom('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(ctx.cacheClient.get(roomKey('missing'))).resolves.toBeNull();
  });

  test('listRoomMessages returns newest first and validates the limit', async () => {
    const room = await service.createRoom('General', '', aliceId);
    for (const content of ['a', 'b', 'c']) {
      ctx.messages.insertMessage({ roomId: room.id, userId: aliceId, content, messageType: 'user' });
    }

    const messages = await service.listRoomMessages(room.id, 2);
    expect(messages.map((m) => m.content)).toEqual(['c', 'b']);
    await expect(service.listRoomMessages(room.id, 0)).rejects.toBeInstanceOf(ValidationError);
    await expect(service.listRoomMessages('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  test('listRoomMessages caches the display window once', async () => {
    const room = await service.createRoom('General', '', aliceId);
    ctx.messages.insertMessage({ roomId: room.id, userId: aliceId, content: 'a', messageType: 'user' });

    await service.listRoomMessages(room.id, 1);
    const cached = await ctx.cacheClient.get(roomMessagesKey(room.id));
    expect(cached === null ? [] : JSON.parse(cached)).toHaveLength(1);
  });

  test('deleteRoom removes the room and its cache entries', async () => {
    const room = await service.createRoom('General', '', aliceId);
    await service.getRoom(room.id);
    await service.listRoomMessages(room.id);
    await service.listRooms();

    await service.deleteRoom(room.id);

    await expect(ctx.cacheClient.get(roomKey(room.id))).resolves.toBeNull();
    await expect(ctx.cacheClient.get(roomMessagesKey(room.id))).resolves.toBeNull();
    await expect(service.listRooms()).resolves.toEqual({ rooms: [], count: 0 });
    await expect(service.deleteRoom(room.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  test('deleteAllRooms clears every room', async () => {
    await service.createRoom('One', '', aliceId);
    await service.createRoom('Two', '', aliceId);
    await service.listRooms();

    await expect(service.deleteAllRooms()).resolves.toBe(2);
    await expect(service.listRooms()).resolves.toEqual({ rooms: [], count: 0 });
  });

  test('deleteAllRooms reports store failures as persistence errors', async () => {
    jest.spyOn(ctx.rooms, 'deleteAllRooms').mockImplementation(() => {
      throw new Error('database is locked');
    });

    await expect(service.deleteAllRooms()).rejects.toThrow(
      new PersistenceError('Could not delete rooms: database is locked')
    );
  });

  test('keeps working when the cache backend is down', async () => {
    const failing = createTestContext(new FailingCacheClient());
    const rooms = new RoomService(failing.rooms, failing.messages, failing.users, failing.cache);

    const room = await rooms.createRoom('General', '', 'user-1');
    await expect(rooms.listRooms()).resolves.toEqual({ rooms: [{ ...room, messageCount: 0 }], count: 1 });
    failing.connection.close();
  });
});
