/**
 * Reply texts used when no generated reply is available
 */
export const UNAVAILABLE_FALLBACK =
  "I'm experiencing technical difficulties. Please try again later.";

export const EMPTY_REPLY_FALLBACK = "I'm sorry, I couldn't process that.";
