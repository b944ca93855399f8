/**
 * Action and action block types.
 *
 * Actions are a closed union over seven kinds. Every action keeps the
 * options it was parsed from so on_setup bookkeeping can recognise it
 * across restarts.
 */

export type ActionKind = 'import_context' | 'compile' | 'copy' | 'symlink' | 'stow' | 'run' | 'trigger';

export const ACTION_KINDS: readonly ActionKind[] = [
  'import_context',
  'compile',
  'copy',
  'symlink',
  'stow',
  'run',
  'trigger',
] as const;

/** Kinds that materialize files; they share one phase and run in declared order */
export const FILE_ACTION_KINDS = ['compile', 'copy', 'symlink', 'stow'] as const;

export type BlockName = 'on_setup' | 'on_startup' | 'on_event' | 'on_exit' | 'on_modified';

export const BLOCK_NAMES: readonly BlockName[] = ['on_setup', 'on_startup', 'on_event', 'on_exit', 'on_modified'] as const;

export type NonTemplateHandling = 'symlink' | 'copy' | 'ignore';

interface ActionBase {
  /** Options exactly as configured */
  options: Record<string, unknown>;
}

export interface ImportContextAction extends ActionBase {
  kind: 'import_context';
  fromPath: string;
  fromSection?: string;
  toSection?: string;
}

export interface CompileAction extends ActionBase {
  kind: 'compile';
  content: string;
  target?: string;
  /** Filename regex (full match); the last capture group renames the target */
  include: string;
  permissions?: string;
}

export interface CopyAction extends ActionBase {
  kind: 'copy';
  content: string;
  target: string;
  include: string;
  permissions?: string;
}

export interface SymlinkAction extends ActionBase {
  kind: 'symlink';
  content: string;
  target: string;
  include: string;
}

export interface StowAction extends ActionBase {
  kind: 'stow';
  content: string;
  target: string;
  templates: string;
  nonTemplates: NonTemplateHandling;
  permissions?: string;
}

export interface RunAction extends ActionBase {
  kind: 'run';
  shell: string;
  /** Seconds; falls back to the global run timeout */
  timeout?: number;
}

export interface TriggerAction extends ActionBase {
  kind: 'trigger';
  block: BlockName;
  /** on_modified key, required when block is on_modified */
  path?: string;
}

export type Action =
  | ImportContextAction
  | CompileAction
  | CopyAction
  | SymlinkAction
  | StowAction
  | RunAction
  | TriggerAction;

export type FileAction = CompileAction | CopyAction | SymlinkAction | StowAction;

export function isFileAction(action: Action): action is FileAction {
  return FILE_ACTION_KINDS.some((kind) => kind === action.kind);
}

/** Actions in declared order; triggers are still unexpanded */
export interface ActionBlock {
  actions: Action[];
}

export interface ModuleBlocks {
  on_setup: ActionBlock;
  on_startup: ActionBlock;
  on_event: ActionBlock;
  on_exit: ActionBlock;
  /** Keyed by the path as written in the configuration */
  on_modified: Map<string, ActionBlock>;
}

/** A file produced by a file action, reported back for reprocessing */
export interface Materialized {
  source: string;
  target: string;
}
