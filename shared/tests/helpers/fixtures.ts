/**
 * Scratch storage and fake collaborators shared by the storage tests.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { AActivityLog, type ActivityListener } from '../../src/activity/AActivityLog.js';
import { ACredentialStore } from '../../src/auth/ACredentialStore.js';
import { APlatformOpener } from '../../src/preview/APlatformOpener.js';

/**
 * Create an empty temporary folder and return its canonical path.
 */
export async function makeScratchDir(prefix = 'minidrive-test-'): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return fs.realpath(dir);
}

export async function removeScratchDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write a file of `size` bytes (filled with 'x') and return its path.
 */
export async function writeSizedFile(dir: string, name: string, size: number): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, Buffer.alloc(size, 'x'));
  return filePath;
}

export class RecordingOpener extends APlatformOpener {
  readonly opened: string[] = [];

  constructor(private readonly failure?: Error) {
    super();
  }

  async openExternally(filePath: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.opened.push(filePath);
  }
}

/**
 * Activity log whose append always throws.
 */
export class FailingActivityLog extends AActivityLog {
  append(_line: string): void {
    throw new Error('activity sink unavailable');
  }

  getLines(): readonly string[] {
    return [];
  }

  subscribe(_listener: ActivityListener): () => void {
    return () => {};
  }

  clear(): void {}
}

/**
 * Credential store backed by an in-memory username to password map.
 */
export class StaticCredentialStore extends ACredentialStore {
  private readonly users: Map<string, string>;

  constructor(users: Record<string, string>) {
    super();
    this.users = new Map(Object.entries(users));
  }

  async authenticate(username: string, password: string): Promise<boolean> {
    return this.users.get(username) === password;
  }
}
