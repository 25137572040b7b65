export { DriveSession, type DriveSessionOptions } from './DriveSession.js';
export {
  executeDriveCommand,
  type DriveCommand,
  type DriveCommandType,
  type CommandPayload,
  type CommandSuccess,
  type CommandFailure,
  type CommandResult,
} from './commands.js';
