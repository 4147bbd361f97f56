/**
 * Redis key patterns.
 */
export const RedisKeys = {
  // Rate limiting (sliding window) per authenticated BYOC client
  rateLimit: (clientId: string) => `rl:byoc:${clientId}`,
};
