export { CreatedFiles, fileHash } from './created-files.js';
export type { Creation, CreationMethod, CreationRecord, CleanupOptions, CleanupResult } from './created-files.js';
export { ExecutedActions } from './executed-actions.js';
export {
  resolveStateDir,
  CREATED_FILES_FILENAME,
  SETUP_FILENAME,
  COMPILED_DIRNAME,
  PID_FILENAME,
} from './state-dir.js';
