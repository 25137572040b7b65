import * as path from 'path';

import { assertValidEntryName } from '../utils/validators/pathValidation.js';

/**
 * Storage root of `username`: one folder per user directly under `baseDir`.
 *
 * @throws InvalidNameError when the username could address another folder
 */
export function resolveUserRoot(baseDir: string, username: string): string {
  assertValidEntryName(username);
  return path.join(path.resolve(baseDir), username);
}
