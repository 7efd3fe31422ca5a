/**
 * Redis key patterns and TTLs.
 */
export const RedisKeys = {
  // Per-chat message log (list, oldest first)
  chatMessages: (chatId: string) => `chat:${chatId}:messages`,

  // Webhook redelivery guard
  msgDedup: (chatId: string, messageId: string) => `msg:${chatId}:${messageId}`,
};

/**
 * TTL constants in seconds
 */
export const RedisTTL = {
  MSG_DEDUP_PROCESSING: 120, // 2 minutes (short TTL for crash recovery)
  MSG_DEDUP_DONE: 24 * 3600, // 24 hours (final state)
};
