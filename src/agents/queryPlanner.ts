import { completeJson, type CompletionClient } from './completionClient';
import { QUERY_PLANNING_PROMPT, buildQueryPlanningMessage } from './prompts';
import { QueryPlanResponseSchema } from './schemas';
import { createLogger, errorMessage, type Logger } from '../utils/logger';

/** Source name → search term. */
export type SearchPlan = Record<string, string>;

const SOURCE_DOMAINS: Record<string, string> = {
  EPAR: 'ema.europa.eu',
  'EMA-PSBG': 'ema.europa.eu',
  'FDA-Approvals': 'accessdata.fda.gov',
  'FDA-PSBG': 'accessdata.fda.gov',
};

export function sourceDomain(source: string): string {
  return SOURCE_DOMAINS[source] ?? source.toLowerCase().replace(/[\s-]/g, '');
}

export function buildFallbackPlan(substanceName: string, sourceNames: string[]): SearchPlan {
  const plan: SearchPlan = {};
  for (const source of sourceNames) {
    plan[source] = `"${substanceName}" approval filetype:pdf site:${sourceDomain(source)}`;
  }
  return plan;
}

function extractMapping(raw: unknown): Record<string, unknown> {
  const parsed = QueryPlanResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Malformed query plan: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  if (parsed.data.search_queries) {
    return parsed.data.search_queries;
  }
  // Some completions return the mapping itself instead of wrapping it.
  const { canonical: _canonical, ...rest } = parsed.data;
  return rest;
}

function lookupTerm(mapping: Record<string, unknown>, source: string): string | undefined {
  let value = mapping[source];
  if (value === undefined) {
    const key = Object.keys(mapping).find((k) => k.toLowerCase() === source.toLowerCase());
    value = key === undefined ? undefined : mapping[key];
  }
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export class QueryPlanner {
  constructor(
    private readonly client: CompletionClient,
    private readonly logger: Logger = createLogger('QueryPlanner')
  ) {}

  async plan(substanceName: string, sourceNames: string[]): Promise<SearchPlan> {
    if (sourceNames.length === 0) {
      return {};
    }

    let mapping: Record<string, unknown>;
    try {
      const raw = await completeJson(this.client, {
        agent: 'queryPlanning',
        systemPrompt: QUERY_PLANNING_PROMPT,
        userMessage: buildQueryPlanningMessage(substanceName, sourceNames),
      });
      mapping = extractMapping(raw);
    } catch (error) {
      this.logger.warn('Query planning failed, using site-filtered fallback queries', {
        substance: substanceName,
        error: errorMessage(error),
      });
      return buildFallbackPlan(substanceName, sourceNames);
    }

    const plan: SearchPlan = {};
    for (const source of sourceNames) {
      const term = lookupTerm(mapping, source);
      if (!term) {
        this.logger.debug(`No search term for ${source}, using substance name`);
      }
      plan[source] = term ?? substanceName;
    }

    for (const [source, term] of Object.entries(plan)) {
      this.logger.info(`${source}: ${term}`);
    }
    return plan;
  }
}
