import { timeoutFromEnv } from '../config/pipelineConfig';

export const AGENT_MODELS = {
  queryPlanning: process.env.PLANNER_MODEL || 'gemini-2.5-flash',
  relevanceAssessment: process.env.RELEVANCE_MODEL || 'gemini-2.5-flash',
  ocr: process.env.OCR_MODEL || 'gemini-2.5-flash',
} as const;

export type AgentName = keyof typeof AGENT_MODELS;

export const AGENT_CONFIG = {
  timeoutMs: timeoutFromEnv(process.env.AI_TIMEOUT_MS, 60000),
  maxTokens: 4096,
  temperature: 0.1,
} as const;

export const OCR_CONFIG = {
  timeoutMs: timeoutFromEnv(process.env.OCR_TIMEOUT_MS, 120000),
  maxTokens: 16000,
  temperature: 0.0,
} as const;

export type AgentConfig = {
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
};
