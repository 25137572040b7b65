/**
 * Drive command dispatch
 *
 * Callers describe a user action as a DriveCommand and get back a
 * CommandResult. Drive errors come back as `{ ok: false, error }` instead of
 * being thrown, so a front end only renders results.
 *
 * @example
 * ```typescript
 * const result = await executeDriveCommand(session, { type: 'mkdir', name: 'Notes' });
 * if (!result.ok) console.error(result.error.message);
 * ```
 */

import type { DriveSession } from './DriveSession.js';
import type { PreviewResult } from '../preview/PreviewDispatcher.js';
import type { QuotaUsage } from '../storage/QuotaTracker.js';
import type { CancellableOptions, Entry } from '../storage/types.js';
import { isDriveError, type DeleteReport, type SerializedDriveError } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';

export type DriveCommand =
  | { type: 'list' }
  | { type: 'filter'; query: string }
  | { type: 'enter'; name: string }
  | { type: 'up' }
  | { type: 'pwd' }
  | { type: 'mkdir'; name: string }
  | { type: 'upload'; sourcePath: string; destName?: string }
  | { type: 'download'; name: string; destinationPath: string }
  | { type: 'delete'; name: string }
  | { type: 'open'; name: string }
  | { type: 'usage' };

export type DriveCommandType = DriveCommand['type'];

export type CommandPayload =
  | { type: 'list'; path: string; entries: Entry[] }
  | { type: 'filter'; path: string; query: string; entries: Entry[] }
  | { type: 'enter'; path: string }
  | { type: 'up'; moved: boolean; path: string }
  | { type: 'pwd'; path: string }
  | { type: 'mkdir'; entry: Entry }
  | { type: 'upload'; entry: Entry }
  | { type: 'download'; entry: Entry; destinationPath: string }
  | { type: 'delete'; name: string; report: DeleteReport }
  | { type: 'open'; preview: PreviewResult }
  | { type: 'usage'; usage: QuotaUsage };

export type CommandSuccess = CommandPayload & { ok: true };

export interface CommandFailure {
  ok: false;
  type: DriveCommandType;
  error: SerializedDriveError;
}

export type CommandResult = CommandSuccess | CommandFailure;

/**
 * Run one command against the session's current folder.
 *
 * Non-drive errors are programming errors and are rethrown.
 */
export async function executeDriveCommand(
  session: DriveSession,
  command: DriveCommand,
  options: CancellableOptions = {}
): Promise<CommandResult> {
  try {
    const payload = await dispatch(session, command, options);
    return { ok: true, ...payload };
  } catch (error) {
    if (!isDriveError(error)) throw error;

    logger.debug('Command failed', {
      component: 'DriveCommands',
      command: command.type,
      errorType: error.type,
      root: session.tree.rootPath,
    });
    return { ok: false, type: command.type, error: error.toJSON() };
  }
}

async function dispatch(
  session: DriveSession,
  command: DriveCommand,
  options: CancellableOptions
): Promise<CommandPayload> {
  const { tree, catalog, fileOps, previews, quota } = session;

  switch (command.type) {
    case 'list':
      return { type: 'list', path: tree.displayPath, entries: await catalog.list(tree) };

    case 'filter':
      return {
        type: 'filter',
        path: tree.displayPath,
        query: command.query,
        entries: await catalog.filter(tree, command.query),
      };

    case 'enter':
      await tree.enter(command.name);
      session.recordActivity(`Opened folder: ${command.name}`);
      return { type: 'enter', path: tree.displayPath };

    case 'up': {
      const moved = tree.up();
      if (moved) session.recordActivity('Went back');
      return { type: 'up', moved, path: tree.displayPath };
    }

    case 'pwd':
      return { type: 'pwd', path: tree.displayPath };

    case 'mkdir':
      return { type: 'mkdir', entry: await fileOps.createFolder(tree, command.name) };

    case 'upload':
      return {
        type: 'upload',
        entry: await fileOps.upload(tree, command.sourcePath, command.destName, options),
      };

    case 'download':
      return {
        type: 'download',
        entry: await fileOps.download(tree, command.name, command.destinationPath, options),
        destinationPath: command.destinationPath,
      };

    case 'delete':
      return { type: 'delete', name: command.name, report: await fileOps.delete(tree, command.name) };

    case 'open': {
      const preview = await previews.preview(tree, command.name);
      session.recordActivity(`Opened file: ${command.name}`);
      return { type: 'open', preview };
    }

    case 'usage':
      return { type: 'usage', usage: await quota.getUsage(tree.rootPath) };
  }
}
