/**
 * MCP tool for embedding-ranked similar terms.
 */

import { z } from 'zod';
import type { AppContext } from '../../server.js';
import { TOOL_LIMITS } from '../../service/OntologyService.js';
import { dualRegister, type ToolHost } from './dualRegister.js';

export function registerSimilarityTools(host: ToolHost, ctx: AppContext): void {
  const { service } = ctx;
  const { defaultTopK, candidatePoolSize } = ctx.config.tools;

  dualRegister(host, {
    name: 'find_similar_terms',
    description:
      `Find terms similar to a phrase or to an existing term. The top ${candidatePoolSize} lexical ` +
      'search matches are re-ranked by embedding cosine similarity (scores in [0, 1]). ' +
      'When embeddings are unavailable the lexical order is returned with degraded=true and null scores.',
    schema: z.object({
      query_text: z.string().optional().describe('Phrase to compare against; give this or term_iri'),
      ontology_scope: z.string().optional()
        .describe('Ontology id (or comma-separated ids) to draw candidates from; required with term_iri'),
      top_k: z.number().int().min(1).max(TOOL_LIMITS.maxTopK).optional()
        .describe(`Results to return (default ${defaultTopK}, max ${TOOL_LIMITS.maxTopK})`),
      term_iri: z.string().optional()
        .describe('Existing term to compare against, instead of query_text'),
    }),
    run: (args, signal) => service.findSimilarTerms({
      queryText: args.query_text,
      ontologyScope: args.ontology_scope,
      topK: args.top_k,
      termIri: args.term_iri,
    }, signal),
  });
}
