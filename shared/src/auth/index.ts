export { ACredentialStore } from './ACredentialStore.js';
export {
  FileCredentialStore,
  parseCredentialLines,
  isBcryptHash,
  type CredentialRecord,
} from './credentialStore.js';
export { resolveUserRoot } from './userRoot.js';
