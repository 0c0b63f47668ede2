/**
 * MCP tools for term search and term detail.
 */

import { z } from 'zod';
import type { AppContext } from '../../server.js';
import { TOOL_LIMITS } from '../../service/OntologyService.js';
import { dualRegister, type ToolHost } from './dualRegister.js';

export function registerTermTools(host: ToolHost, ctx: AppContext): void {
  const { service } = ctx;
  const defaults = ctx.config.tools;

  dualRegister(host, {
    name: 'search_terms',
    description:
      'Search ontology terms by label, synonym or identifier. ' +
      'Hits are ordered by descending relevance score.',
    schema: z.object({
      query: z.string().describe('Search text, e.g. "apoptosis"'),
      ontology: z.string().optional()
        .describe('Restrict to one ontology id or a comma-separated list, e.g. "go" or "go,hp"'),
      exact: z.boolean().optional().describe('Match labels and synonyms exactly (default false)'),
      page: z.number().int().min(0).optional().describe('0-based page number (default 0)'),
      rows: z.number().int().min(1).max(TOOL_LIMITS.maxRows).optional()
        .describe(`Hits per page (default ${defaults.searchRows}, max ${TOOL_LIMITS.maxRows})`),
      include_obsolete: z.boolean().optional().describe('Include obsolete terms (default false)'),
    }),
    run: (args, signal) => service.searchTerms({
      query: args.query,
      ontology: args.ontology,
      exact: args.exact,
      page: args.page,
      rows: args.rows,
      includeObsolete: args.include_obsolete,
    }, signal),
  });

  dualRegister(host, {
    name: 'get_term_info',
    description:
      'Get a term\'s label, definition, synonyms, obsolete flag and direct parent/child IRIs. ' +
      'Without an ontology, the term is resolved across all ontologies (defining ontology first).',
    schema: z.object({
      ontology: z.string().optional().describe('Ontology id, e.g. "go"; omit to look the term up everywhere'),
      term_iri: z.string()
        .describe('Term IRI, e.g. "http://purl.obolibrary.org/obo/GO_0008150", or an id such as "GO:0008150"'),
    }),
    run: (args, signal) => service.getTermInfo({ ontology: args.ontology, termIri: args.term_iri }, signal),
  });
}
