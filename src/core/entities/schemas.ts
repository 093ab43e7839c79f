import { z } from 'zod';

/**
 * Shapes of values read back from the cache. A cached value that no longer
 * matches is treated as a miss.
 */
export const MessageViewSchema = z.object({
  id: z.string(),
  roomId: z.string(),
  userId: z.string().nullable(),
  content: z.string(),
  messageType: z.enum(['user', 'ai']),
  createdAt: z.string(),
  username: z.string(),
});

export const MessageViewListSchema = z.array(MessageViewSchema);

const RoomSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  createdBy: z.string(),
  createdAt: z.string(),
  messageCount: z.number().int().nonnegative(),
});

export const RoomListSchema = z.object({
  rooms: z.array(RoomSummarySchema),
  count: z.number().int().nonnegative(),
});

export const RoomWithMessagesSchema = RoomSummarySchema.extend({
  messages: MessageViewListSchema,
});
