export { analyzeIntent, scoreKeywords } from './intent-router.js';
export type { IntentAnalysis, QueryComplexity } from './intent-router.js';
