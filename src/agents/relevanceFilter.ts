import { completeJson, type CompletionClient } from './completionClient';
import { buildRelevancePrompt } from './prompts';
import { RelevanceVerdictSchema, type RelevanceVerdict } from './schemas';
import {
  ACCEPTANCE_CONFIDENCE_THRESHOLD,
  INTER_BATCH_DELAY_MS,
  RELEVANCE_BATCH_SIZE,
  SAMPLE_MAX_CHARS,
  SAMPLE_MAX_PAGES,
} from '../config/pipelineConfig';
import type { PdfCandidate } from '../pipeline/types';
import { processInBatches } from '../utils/batch';
import { createLogger, errorMessage, type Logger } from '../utils/logger';

/** Anything that can turn a PDF URL into a text sample. */
export interface TextSampler {
  extractSample(pdfUrl: string, maxPages?: number): Promise<string>;
}

export interface RelevanceFilterOptions {
  batchSize?: number;
  delayMs?: number;
  threshold?: number;
  sampleMaxPages?: number;
  sampleMaxChars?: number;
  logger?: Logger;
}

export function isAccepted(
  verdict: RelevanceVerdict,
  threshold: number = ACCEPTANCE_CONFIDENCE_THRESHOLD
): boolean {
  return (verdict.relevance === 'high' || verdict.relevance === 'medium') && verdict.confidence > threshold;
}

export class RelevanceFilter {
  private readonly batchSize: number;
  private readonly delayMs: number;
  private readonly threshold: number;
  private readonly sampleMaxPages: number;
  private readonly sampleMaxChars: number;
  private readonly logger: Logger;

  constructor(
    private readonly client: CompletionClient,
    private readonly sampler: TextSampler,
    options: RelevanceFilterOptions = {}
  ) {
    this.batchSize = options.batchSize ?? RELEVANCE_BATCH_SIZE;
    this.delayMs = options.delayMs ?? INTER_BATCH_DELAY_MS;
    this.threshold = options.threshold ?? ACCEPTANCE_CONFIDENCE_THRESHOLD;
    this.sampleMaxPages = options.sampleMaxPages ?? SAMPLE_MAX_PAGES;
    this.sampleMaxChars = options.sampleMaxChars ?? SAMPLE_MAX_CHARS;
    this.logger = options.logger ?? createLogger('RelevanceFilter');
  }

  /**
   * Verdict for one candidate, or null when there is no usable signal (no
   * text, or a response that does not fit the verdict shape). Completion
   * failures propagate.
   */
  async assess(candidate: PdfCandidate, substanceName: string): Promise<RelevanceVerdict | null> {
    const sample = await this.sampler.extractSample(candidate.url, this.sampleMaxPages);
    if (!sample.trim()) {
      this.logger.warn(`No text extracted from PDF: ${candidate.url}`);
      return null;
    }

    const raw = await completeJson(this.client, {
      agent: 'relevanceAssessment',
      systemPrompt: buildRelevancePrompt(substanceName),
      userMessage: sample.slice(0, this.sampleMaxChars),
    });

    const parsed = RelevanceVerdictSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Malformed relevance verdict for ${candidate.url}`, {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }
    return parsed.data;
  }

  private async isRelevant(candidate: PdfCandidate, substanceName: string): Promise<boolean> {
    let verdict: RelevanceVerdict | null;
    try {
      verdict = await this.assess(candidate, substanceName);
    } catch (error) {
      this.logger.error(`Error assessing PDF relevance for ${candidate.url}`, {
        error: errorMessage(error),
      });
      return false;
    }
    if (!verdict) return false;

    const accepted = isAccepted(verdict, this.threshold);
    const detail = `${candidate.title} (relevance: ${verdict.relevance}, confidence: ${verdict.confidence})`;
    if (accepted) {
      this.logger.info(`PDF deemed relevant: ${detail}`);
    } else {
      this.logger.debug(`PDF filtered out: ${detail}`, { reasoning: verdict.reasoning });
    }
    return accepted;
  }

  async filter(candidates: readonly PdfCandidate[], substanceName: string): Promise<PdfCandidate[]> {
    const settled = await processInBatches(
      candidates,
      (candidate) => this.isRelevant(candidate, substanceName),
      { batchSize: this.batchSize, delayMs: this.delayMs }
    );

    const accepted: PdfCandidate[] = [];
    settled.forEach((result, index) => {
      const candidate = candidates[index];
      if (!candidate) return;
      if (result.status === 'rejected') {
        this.logger.error(`Relevance check crashed for ${candidate.url}`, {
          error: errorMessage(result.reason),
        });
        return;
      }
      if (result.value) accepted.push(candidate);
    });
    return accepted;
  }
}
