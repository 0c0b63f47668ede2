/**
 * MCP tools for ontology-level metadata: listing/searching ontologies and
 * fetching one ontology's descriptor.
 */

import { z } from 'zod';
import type { AppContext } from '../../server.js';
import { TOOL_LIMITS } from '../../service/OntologyService.js';
import { dualRegister, type ToolHost } from './dualRegister.js';

export function registerOntologyTools(host: ToolHost, ctx: AppContext): void {
  const { service } = ctx;
  const defaults = ctx.config.tools;

  dualRegister(host, {
    name: 'search_ontologies',
    description:
      'List ontologies loaded in OLS, optionally filtered by a search string. ' +
      'Returns ids, titles, descriptions, versions and term counts.',
    schema: z.object({
      query: z.string().optional().describe('Text matched against ontology ids, titles and descriptions'),
      page: z.number().int().min(0).optional().describe('0-based page number (default 0)'),
      size: z.number().int().min(1).max(TOOL_LIMITS.maxPageSize).optional()
        .describe(`Ontologies per page (default ${defaults.ontologyPageSize}, max ${TOOL_LIMITS.maxPageSize})`),
    }),
    run: (args, signal) => service.searchOntologies(args, signal),
  });

  dualRegister(host, {
    name: 'get_ontology_info',
    description:
      'Get metadata for one ontology: title, description, version, number of terms, ' +
      'preferred prefix and homepage.',
    schema: z.object({
      ontology: z.string().describe('Ontology id, e.g. "go", "hp", "efo" (case-insensitive)'),
    }),
    run: (args, signal) => service.getOntologyInfo(args.ontology, signal),
  });
}
