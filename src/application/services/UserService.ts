import { IUserRepository } from '../../core/interfaces/IUserRepository.js';
import { User } from '../../core/entities/User.js';
import {
  ConflictError,
  PersistenceError,
  UnauthorizedError,
  ValidationError,
  errorMessage,
} from '../../core/errors.js';

/**
 * Minimal identity: a user is a registered username, and requests name their
 * author by user id
 */
export class UserService {
  constructor(private userRepo: IUserRepository) {}

  register(username: string): User {
    const trimmed = username.trim();
    if (!trimmed) {
      throw new ValidationError('Username must not be empty');
    }
    try {
      return this.userRepo.createUser(trimmed);
    } catch (error) {
      if (errorMessage(error).includes('UNIQUE')) {
        throw new ConflictError(`Username "${trimmed}" is taken`);
      }
      throw new PersistenceError('Could not create user', error);
    }
  }

  /**
   * Resolve the acting user, rejecting missing or unknown ids
   */
  authenticate(userId: string | undefined): User {
    if (!userId) {
      throw new UnauthorizedError();
    }
    const user = this.userRepo.getUser(userId);
    if (!user) {
      throw new UnauthorizedError(`Unknown user: ${userId}`);
    }
    return user;
  }
}
