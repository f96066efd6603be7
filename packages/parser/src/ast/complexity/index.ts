export { calculateComplexity, countExceptHandlers } from './cyclomatic.js';
export { calculateNestingDepth } from './nesting.js';
export { calculateScopeComplexity } from './scope.js';
export type { ScopeComplexity } from './scope.js';
