import { GoogleGenerativeAI, type Part } from '@google/generative-ai';
import { AGENT_CONFIG, AGENT_MODELS, type AgentConfig, type AgentName } from './config';
import { CompletionError, CompletionParseError, TimeoutError } from './errors';
import { limit, type Lane } from '../utils/limiter';
import { createLogger, errorMessage, type Logger } from '../utils/logger';

export interface CompletionAttachment {
  mimeType: string;
  data: Buffer;
}

export interface CompletionRequest {
  agent: AgentName;
  systemPrompt: string;
  userMessage: string;
  /** Ask the model for a single JSON object instead of free text. */
  json?: boolean;
  attachment?: CompletionAttachment;
  config?: Partial<AgentConfig>;
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export async function completeJson(
  client: CompletionClient,
  request: Omit<CompletionRequest, 'json'>
): Promise<unknown> {
  const text = await client.complete({ ...request, json: true });
  return parseJsonResponse(request.agent, text);
}

export function parseJsonResponse(agent: string, text: string): unknown {
  const trimmed = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');
  try {
    return JSON.parse(trimmed);
  } catch (error) {
    throw new CompletionParseError(agent, trimmed.slice(0, 200), errorMessage(error));
  }
}

function withTimeout<T>(promise: Promise<T>, agent: string, timeoutMs: number): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new TimeoutError(agent, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeoutPromise]).finally(() => {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  });
}

export class GeminiCompletionClient implements CompletionClient {
  private readonly genAI: GoogleGenerativeAI;

  constructor(
    apiKey: string = process.env.GOOGLE_API_KEY || '',
    private readonly logger: Logger = createLogger('Gemini')
  ) {
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY environment variable is not set');
    }
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async complete(request: CompletionRequest): Promise<string> {
    const config: AgentConfig = { ...AGENT_CONFIG, ...request.config };
    const modelName = AGENT_MODELS[request.agent];
    const lane: Lane = request.agent === 'ocr' ? 'gemini_ocr' : 'gemini_llm';
    const model = this.genAI.getGenerativeModel({
      model: modelName,
      systemInstruction: request.systemPrompt,
    });

    const parts: Part[] = [{ text: request.userMessage }];
    if (request.attachment) {
      parts.push({
        inlineData: {
          mimeType: request.attachment.mimeType,
          data: request.attachment.data.toString('base64'),
        },
      });
    }

    const startedAt = Date.now();
    try {
      const response = await limit(lane, () =>
        withTimeout(
          model.generateContent({
            contents: [{ role: 'user', parts }],
            generationConfig: {
              maxOutputTokens: config.maxTokens,
              temperature: config.temperature,
              ...(request.json ? { responseMimeType: 'application/json' } : {}),
            },
          }),
          request.agent,
          config.timeoutMs
        )
      );

      const text = response.response.text();
      if (!text) {
        throw new Error('No text content in API response');
      }
      this.logger.debug(`[${request.agent}] ${text.length} chars in ${Date.now() - startedAt}ms`, {
        model: modelName,
      });
      return text;
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw error;
      }
      throw new CompletionError(
        request.agent,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }
}
