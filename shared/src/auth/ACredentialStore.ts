/**
 * Abstract Credential Store Service
 *
 * Answers whether a username/password pair may open a storage root.
 * Storage and hashing of credentials are left to the implementation.
 *
 * @see FileCredentialStore for the bcrypt-backed file implementation
 */
import { AService } from '../services/abstracts/AService.js';

export abstract class ACredentialStore extends AService {
  /**
   * @returns true when the pair matches a stored credential
   */
  abstract authenticate(username: string, password: string): Promise<boolean>;
}
