export { Module, parseModuleDefinition } from './module.js';
export type { ModuleDefinition, ModuleOptions, ModuleState } from './module.js';
export { ModuleManager, DEFAULT_MODULE_SETTINGS } from './module-manager.js';
export type { ModuleManagerOptions, ModuleSettings } from './module-manager.js';
