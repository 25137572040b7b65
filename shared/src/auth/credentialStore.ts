/**
 * File-backed credential store.
 *
 * One `username,bcryptHash` record per line. Passwords are only ever
 * compared through bcrypt; a record whose second field is not a bcrypt hash
 * never matches.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import bcrypt from 'bcryptjs';

import { ACredentialStore } from './ACredentialStore.js';
import { BCRYPT_ROUNDS, CREDENTIALS_FILE } from '../config/env.js';
import { logger } from '../utils/logging/logger.js';
import { InvalidNameError, IoFailureError, isNotFoundCode } from '../utils/errorTypes.js';
import { assertValidEntryName } from '../utils/validators/pathValidation.js';

const BCRYPT_HASH_PATTERN = /^\$2[abxy]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export interface CredentialRecord {
  username: string;
  passwordHash: string;
}

/**
 * Parse credential file content. Blank lines, `#` comments and lines
 * without a comma are skipped.
 */
export function parseCredentialLines(content: string): CredentialRecord[] {
  const records: CredentialRecord[] = [];
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) continue;

    const comma = line.indexOf(',');
    if (comma <= 0) continue;

    records.push({
      username: line.slice(0, comma).trim(),
      passwordHash: line.slice(comma + 1).trim(),
    });
  }
  return records;
}

export function isBcryptHash(value: string): boolean {
  return BCRYPT_HASH_PATTERN.test(value);
}

export class FileCredentialStore extends ACredentialStore {
  constructor(
    readonly filePath: string = CREDENTIALS_FILE,
    private readonly rounds: number = BCRYPT_ROUNDS
  ) {
    super();
  }

  async readRecords(): Promise<CredentialRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFoundCode(error)) {
        logger.warn('Credentials file not found', { component: 'CredentialStore', path: this.filePath });
        return [];
      }
      throw IoFailureError.from(error, 'read credentials', this.filePath);
    }
    return parseCredentialLines(content);
  }

  async authenticate(username: string, password: string): Promise<boolean> {
    const records = await this.readRecords();
    const record = records.find((candidate) => candidate.username === username);

    if (!record) {
      logger.info('Login rejected: unknown user', { component: 'CredentialStore', username });
      return false;
    }
    if (!isBcryptHash(record.passwordHash)) {
      logger.warn('Login rejected: stored credential is not a bcrypt hash', { component: 'CredentialStore', username });
      return false;
    }

    const valid = await bcrypt.compare(password, record.passwordHash);
    if (!valid) {
      logger.info('Login rejected: wrong password', { component: 'CredentialStore', username });
    }
    return valid;
  }

  /**
   * Hash `password` and append a record for `username`.
   *
   * @throws InvalidNameError for a malformed or already registered username
   */
  async addUser(username: string, password: string): Promise<void> {
    assertValidEntryName(username);
    if (username.includes(',') || username !== username.trim()) {
      throw new InvalidNameError('Username cannot contain commas or surrounding spaces', username);
    }

    const records = await this.readRecords();
    if (records.some((record) => record.username === username)) {
      throw new InvalidNameError(`User '${username}' already exists`, username);
    }

    const passwordHash = await bcrypt.hash(password, this.rounds);

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const existing = await fs.readFile(this.filePath, 'utf-8').catch((error: unknown) => {
        if (isNotFoundCode(error)) return '';
        throw error;
      });
      const separator = existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';
      await fs.appendFile(this.filePath, `${separator}${username},${passwordHash}\n`, { mode: 0o600 });
    } catch (error) {
      throw IoFailureError.from(error, 'write credentials', this.filePath);
    }

    logger.info('User added', { component: 'CredentialStore', username });
  }
}
