import { ConversationEntry } from '../entities/Message.js';
import type { CircuitBreakerStats } from '../../utils/retry.js';

/**
 * Turns a prompt plus conversation history into reply text.
 * Implementations resolve with fallback text instead of rejecting.
 */
export interface IGeneratorClient {
  generate(prompt: string, history: ConversationEntry[]): Promise<string>;

  healthCheck(): Promise<boolean>;

  getCircuitBreakerStats(): CircuitBreakerStats;
}
