/**
 * @fileoverview Unit tests for the RCSB two-stage search client.
 * @module tests/services/structure-finder/providers/rcsb/search-client.test
 */
import { afterEach, describe, expect, it, vi, type Mock } from 'vitest';

import { searchEntryIds } from '@/services/structure-finder/providers/rcsb/search-client.js';
import { createTestContext } from '../../../../helpers/fakeStructureProvider.js';

const settings = {
  searchUrl: 'https://search.example.test/query',
  timeoutMs: 1000,
};
const context = createTestContext();

function hits(...ids: string[]): Response {
  return Response.json({
    query_id: 'q1',
    result_type: 'entry',
    total_count: ids.length,
    result_set: ids.map((identifier) => ({ identifier, score: 1 })),
  });
}

function stubFetch(...responses: Array<() => Response>): Mock<typeof fetch> {
  const fetchMock = vi.fn<typeof fetch>();
  for (const next of responses) {
    fetchMock.mockImplementationOnce(async () => next());
  }
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function postedBody(fetchMock: Mock<typeof fetch>, call: number): unknown {
  const body = fetchMock.mock.calls[call]?.[1]?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

describe('searchEntryIds', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return precise hits without running the fallback', async () => {
    const fetchMock = stubFetch(() => hits('1M17', '2ITY'));

    await expect(searchEntryIds('egfr', settings, context)).resolves.toEqual([
      '1M17',
      '2ITY',
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should post an OR group of title, description and uppercased gene name', async () => {
    const fetchMock = stubFetch(() => hits('1M17'));

    await searchEntryIds('egfr', settings, context);

    expect(fetchMock.mock.calls[0]?.[0]).toBe(settings.searchUrl);
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(postedBody(fetchMock, 0)).toEqual({
      query: {
        type: 'group',
        logical_operator: 'or',
        nodes: [
          {
            type: 'terminal',
            service: 'text',
            parameters: {
              attribute: 'struct.title',
              operator: 'contains_phrase',
              value: 'egfr',
            },
          },
          {
            type: 'terminal',
            service: 'text',
            parameters: {
              attribute: 'rcsb_polymer_entity.pdbx_description',
              operator: 'contains_words',
              value: 'egfr',
            },
          },
          {
            type: 'terminal',
            service: 'text',
            parameters: {
              attribute: 'rcsb_entity_source_organism.gene.rcsb_gene_name.value',
              operator: 'contains_words',
              value: 'EGFR',
            },
          },
        ],
      },
      return_type: 'entry',
      request_options: { return_all_hits: true },
    });
  });

  it('should fall back to full-text search when the precise result set is empty', async () => {
    const fetchMock = stubFetch(
      () => hits(),
      () => hits('3W2S'),
    );

    await expect(
      searchEntryIds('kinase domain', settings, context),
    ).resolves.toEqual(['3W2S']);
    expect(postedBody(fetchMock, 1)).toEqual({
      query: {
        type: 'terminal',
        service: 'full_text',
        parameters: { value: 'kinase domain' },
      },
      return_type: 'entry',
      request_options: { return_all_hits: true },
    });
  });

  it('should treat a 204 response as an empty result set', async () => {
    const fetchMock = stubFetch(
      () => new Response(null, { status: 204 }),
      () => hits('4HJO'),
    );

    await expect(searchEntryIds('egfr', settings, context)).resolves.toEqual([
      '4HJO',
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should fall back when the precise stage fails with an HTTP error', async () => {
    stubFetch(
      () => new Response('', { status: 500, statusText: 'Server Error' }),
      () => hits('5UG9'),
    );

    await expect(searchEntryIds('egfr', settings, context)).resolves.toEqual([
      '5UG9',
    ]);
  });

  it('should return an empty list when both stages fail', async () => {
    stubFetch(
      () => new Response('not json', { status: 200 }),
      () => new Response('', { status: 502, statusText: 'Bad Gateway' }),
    );

    await expect(searchEntryIds('egfr', settings, context)).resolves.toEqual(
      [],
    );
  });

  it('should treat a missing result_set as no hits', async () => {
    stubFetch(
      () => Response.json({ query_id: 'q1' }),
      () => Response.json({ query_id: 'q2' }),
    );

    await expect(searchEntryIds('egfr', settings, context)).resolves.toEqual(
      [],
    );
  });
});
