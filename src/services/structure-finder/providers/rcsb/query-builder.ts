/**
 * @fileoverview Query builders for the RCSB search API.
 * @module src/services/structure-finder/providers/rcsb/query-builder
 */

import { SEARCH_ATTRIBUTES } from './config.js';
import type { RcsbSearchQuery, RcsbSearchRequest } from './types.js';

/**
 * Title phrase OR description words OR gene-name words (uppercased).
 */
export function buildPreciseQuery(query: string): RcsbSearchQuery {
  return {
    type: 'group',
    logical_operator: 'or',
    nodes: [
      {
        type: 'terminal',
        service: 'text',
        parameters: {
          attribute: SEARCH_ATTRIBUTES.title,
          operator: 'contains_phrase',
          value: query,
        },
      },
      {
        type: 'terminal',
        service: 'text',
        parameters: {
          attribute: SEARCH_ATTRIBUTES.description,
          operator: 'contains_words',
          value: query,
        },
      },
      {
        type: 'terminal',
        service: 'text',
        parameters: {
          attribute: SEARCH_ATTRIBUTES.geneName,
          operator: 'contains_words',
          value: query.toUpperCase(),
        },
      },
    ],
  };
}

export function buildFullTextQuery(query: string): RcsbSearchQuery {
  return {
    type: 'terminal',
    service: 'full_text',
    parameters: { value: query },
  };
}

/**
 * Wrap a query node in an entry-returning, unpaginated request document.
 */
export function buildSearchRequest(query: RcsbSearchQuery): RcsbSearchRequest {
  return {
    query,
    return_type: 'entry',
    request_options: {
      return_all_hits: true,
    },
  };
}
