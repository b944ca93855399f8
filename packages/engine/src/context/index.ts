export { Context, isValidContextKey } from './context.js';
export type { ContextScalar, ContextValue } from './context.js';
