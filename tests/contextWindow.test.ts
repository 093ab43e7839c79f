import { ContextWindowBuilder } from '../src/application/services/ContextWindowBuilder.js';
import { RoomService } from '../src/application/services/RoomService.js';
import { createTestContext, TestContext } from './helpers.js';

describe('ContextWindowBuilder', () => {
  let ctx: TestContext;
  let roomId: string;
  let aliceId: string;

  const say = (content: string, type: 'user' | 'ai' = 'user') =>
    ctx.messages.insertMessage({
      roomId,
      userId: type === 'user' ? aliceId : null,
      content,
      messageType: type,
    });

  beforeEach(() => {
    ctx = createTestContext();
    aliceId = ctx.users.createUser('alice').id;
    roomId = ctx.rooms.createRoom('General', '', aliceId).id;
  });

  afterEach(() => {
    ctx.connection.close();
  });

  test('returns the most recent messages oldest first', async () => {
    say('one');
    say('two', 'ai');
    say('three');
    const builder = new ContextWindowBuilder(ctx.messages, ctx.users, ctx.cache, 50);

    await expect(builder.buildWindow(roomId, 2)).resolves.toEqual([
      { speaker: 'AI Assistant', text: 'two' },
      { speaker: 'alice', text: 'three' },
    ]);
  });

  test('returns nothing for a non-positive limit', async () => {
    say('one');
    const builder = new ContextWindowBuilder(ctx.messages, ctx.users, ctx.cache, 50);

    await expect(builder.buildWindow(roomId, 0)).resolves.toEqual([]);
  });

  test('reads through a cached message list that covers the window', async () => {
    say('one');
    say('two');
    const rooms = new RoomService(ctx.rooms, ctx.messages, ctx.users, ctx.cache);
    await rooms.listRoomMessages(roomId);

    // Written behind the cache's back, so only a store read would see it
    say('three');
    const builder = new ContextWindowBuilder(ctx.messages, ctx.users, ctx.cache, 50);

    await expect(builder.buildWindow(roomId, 10)).resolves.toEqual([
      { speaker: 'alice', text: 'one' },
      { speaker: 'alice', text: 'two' },
    ]);
  });

  test('reads the store when a full cached list is shorter than the window', async () => {
    say('one');
    say('two');
    say('three');
    const rooms = new RoomService(ctx.rooms, ctx.messages, ctx.users, ctx.cache, {
      displayLimit: 2,
      previewLimit: 10,
    });
    await rooms.listRoomMessages(roomId);
    const builder = new ContextWindowBuilder(ctx.messages, ctx.users, ctx.cache, 2);

    await expect(builder.buildWindow(roomId, 3)).resolves.toEqual([
      { speaker: 'alice', text: 'one' },
      { speaker: 'alice', text: 'two' },
      { speaker: 'alice', text: 'three' },
    ]);
  });

  test('never writes the cache', async () => {
    say('one');
    const set = jest.spyOn(ctx.cacheClient, 'set');
    const builder = new ContextWindowBuilder(ctx.messages, ctx.users, ctx.cache, 50);

    await builder.buildWindow(roomId, 10);
    expect(set).not.toHaveBeenCalled();
  });
});
