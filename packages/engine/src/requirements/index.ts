export { RequirementChecker, parseRequirements, findExecutable, DEFAULT_REQUIRES_TIMEOUT } from './requirement-checker.js';
export type { RequirementCheckerOptions } from './requirement-checker.js';
export { resolveModuleDependencies, findCycle } from './dependencies.js';
export type { DependencyNode, DependencyResolution } from './dependencies.js';
export type { RequirementClause, ClauseResult } from './types.js';
