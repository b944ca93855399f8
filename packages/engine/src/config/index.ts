export { loadConfig, parseSettings, resolveConfigDir, DEFAULT_ENABLED_MODULES, DEFAULT_MODULES_DIRECTORY } from './config-loader.js';
export type { LoadConfigOptions } from './config-loader.js';
export { preprocessConfig, substituteEnvironment } from './preprocess.js';
export { GitRepositoryFetcher, parseGithubRepository, repositoryUrl } from './repository.js';
export type { GithubRepository, RepositoryFetcher } from './repository.js';
export { CONFIG_FILENAME, MODULES_FILENAME, CONTEXT_DIRNAME } from './types.js';
export type { ConfigValidationError, EnablingStatement, LoadedConfig, SolsticeSettings } from './types.js';
