import { describe, it, expect } from '@jest/globals';
import { QueryPlanner, buildFallbackPlan, sourceDomain } from '../src/agents/queryPlanner';
import { CompletionError } from '../src/agents/errors';
import { FakeCompletionClient, recordingLogger } from './helpers/fakes';

const SOURCES = ['EPAR', 'EMA-PSBG', 'FDA-Approvals', 'FDA-PSBG'];

function planner(reply: ConstructorParameters<typeof FakeCompletionClient>[0]) {
  const client = new FakeCompletionClient(reply);
  return { client, planner: new QueryPlanner(client, recordingLogger()) };
}

describe('sourceDomain', () => {
  it('maps the shipped sources to their domains', () => {
    expect(sourceDomain('EPAR')).toBe('ema.europa.eu');
    expect(sourceDomain('EMA-PSBG')).toBe('ema.europa.eu');
    expect(sourceDomain('FDA-Approvals')).toBe('accessdata.fda.gov');
    expect(sourceDomain('FDA-PSBG')).toBe('accessdata.fda.gov');
  });

  it('derives a placeholder domain for other sources', () => {
    expect(sourceDomain('Health Canada-DPD')).toBe('healthcanadadpd');
  });
});

describe('QueryPlanner', () => {
  it('uses search_queries from the completion', async () => {
    const { client, planner: p } = planner(
      JSON.stringify({
        canonical: 'ibuprofen',
        search_queries: {
          EPAR: 'ibuprofen EPAR',
          'EMA-PSBG': 'ibuprofen bioequivalence',
          'FDA-Approvals': 'ibuprofen NDA',
          'FDA-PSBG': 'ibuprofen guidance',
        },
      })
    );

    const plan = await p.plan('Ibuprofen', SOURCES);

    expect(plan).toEqual({
      EPAR: 'ibuprofen EPAR',
      'EMA-PSBG': 'ibuprofen bioequivalence',
      'FDA-Approvals': 'ibuprofen NDA',
      'FDA-PSBG': 'ibuprofen guidance',
    });
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]?.agent).toBe('queryPlanning');
    expect(client.requests[0]?.json).toBe(true);
    expect(client.requests[0]?.userMessage).toContain('Ibuprofen');
  });

  it('treats a bare object as the mapping and fills missing sources', async () => {
    const { planner: p } = planner('```json\n{"epar": "ibuprofen assessment", "FDA-PSBG": "  "}\n```');

    const plan = await p.plan('Ibuprofen', SOURCES);

    expect(plan).toEqual({
      EPAR: 'ibuprofen assessment',
      'EMA-PSBG': 'Ibuprofen',
      'FDA-Approvals': 'Ibuprofen',
      'FDA-PSBG': 'Ibuprofen',
    });
  });

  it('gives every source the substance name for an empty object', async () => {
    const { planner: p } = planner('{}');

    expect(await p.plan('Ibuprofen', ['EPAR', 'FDA-PSBG'])).toEqual({
      EPAR: 'Ibuprofen',
      'FDA-PSBG': 'Ibuprofen',
    });
  });

  it('falls back to site-filtered queries when the completion fails', async () => {
    const { planner: p } = planner(new CompletionError('queryPlanning', new Error('quota exceeded')));

    const plan = await p.plan('Ibuprofen', SOURCES);

    expect(plan).toEqual(buildFallbackPlan('Ibuprofen', SOURCES));
    expect(plan.EPAR).toBe('"Ibuprofen" approval filetype:pdf site:ema.europa.eu');
    expect(plan['FDA-Approvals']).toBe('"Ibuprofen" approval filetype:pdf site:accessdata.fda.gov');
  });

  it('falls back when the response is not JSON', async () => {
    const { planner: p } = planner('Here are some queries for you');

    expect(await p.plan('Ibuprofen', ['EPAR'])).toEqual({
      EPAR: '"Ibuprofen" approval filetype:pdf site:ema.europa.eu',
    });
  });

  it('falls back when search_queries has the wrong shape', async () => {
    const { planner: p } = planner(JSON.stringify({ search_queries: ['ibuprofen'] }));

    expect(await p.plan('Ibuprofen', ['FDA-PSBG'])).toEqual({
      'FDA-PSBG': '"Ibuprofen" approval filetype:pdf site:accessdata.fda.gov',
    });
  });

  it('skips the completion when there are no sources', async () => {
    const { client, planner: p } = planner('{}');

    expect(await p.plan('Ibuprofen', [])).toEqual({});
    expect(client.requests).toHaveLength(0);
  });
});
