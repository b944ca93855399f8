export { ActionExecutor, defaultCompileTarget } from './action-executor.js';
export type { ActionExecutorOptions, ActionOutcome, ExecutionScope } from './action-executor.js';
export { parseAction, parseActionBlock, parseModuleBlocks } from './parse.js';
export { expandBlock, findModifiedBlock, validateTriggers, MAX_TRIGGER_DEPTH } from './triggers.js';
export type { BlockRef, ExpandedAction, ExpansionOptions } from './triggers.js';
export { substitutePlaceholders, expandPath } from './placeholders.js';
export type { PlaceholderScope, PathExpansionOptions } from './placeholders.js';
export { applyPermissions } from './permissions.js';
export { planFiles, renameFor, matchesFilename, listFiles } from './file-matching.js';
export type { FilePlan } from './file-matching.js';
export { nextBackupPath, prepareTarget } from './backup.js';
export { ACTION_KINDS, BLOCK_NAMES, FILE_ACTION_KINDS, isFileAction } from './types.js';
export type {
  Action,
  ActionBlock,
  ActionKind,
  BlockName,
  CompileAction,
  CopyAction,
  FileAction,
  ImportContextAction,
  Materialized,
  ModuleBlocks,
  NonTemplateHandling,
  RunAction,
  StowAction,
  SymlinkAction,
  TriggerAction,
} from './types.js';
