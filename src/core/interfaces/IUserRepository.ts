import { User } from '../entities/User.js';

/**
 * Interface for user lookup (display names only)
 */
export interface IUserRepository {
  createUser(username: string): User;

  getUser(userId: string): User | null;

  getUsers(userIds: string[]): Map<string, User>;
}
