export { QUERY_PLANNING_PROMPT, buildQueryPlanningMessage } from './queryPlanning';
export { buildRelevancePrompt } from './relevanceAssessment';
export { OCR_PROMPT, buildOcrMessage } from './ocr';
