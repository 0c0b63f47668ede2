import { z } from 'zod';
import type { AppContext } from '../../server.js';
import { dualRegister, type ToolHost } from './dualRegister.js';

export function registerHierarchyTools(host: ToolHost, ctx: AppContext): void {
  const { service } = ctx;
  const { defaultDepth, maxDepth } = ctx.config.tools;

  const hierarchySchema = z.object({
    ontology: z.string().describe('Ontology id, e.g. "go" or "hp"'),
    term_iri: z.string().describe('Term IRI or an id such as "HP:0000118"'),
    depth: z.number().int().min(1).max(maxDepth).optional()
      .describe(`Levels to walk (default ${defaultDepth}, max ${maxDepth}); 1 = direct relations only`),
    include_obsolete: z.boolean().optional().describe('Include obsolete terms (default false)'),
  });

  dualRegister(host, {
    name: 'get_term_children',
    description:
      'Walk a term\'s children breadth-first. Each descendant appears once, at the depth ' +
      'where it was first reached, with the parent/child edges seen on the way.',
    schema: hierarchySchema,
    run: (args, signal) => service.getTermChildren({
      ontology: args.ontology,
      termIri: args.term_iri,
      depth: args.depth,
      includeObsolete: args.include_obsolete,
    }, signal),
  });

  dualRegister(host, {
    name: 'get_term_ancestors',
    description:
      'Walk a term\'s parents breadth-first. depth=1 returns direct parents only; ' +
      'larger depths add grandparents and beyond, each once.',
    schema: hierarchySchema,
    run: (args, signal) => service.getTermAncestors({
      ontology: args.ontology,
      termIri: args.term_iri,
      depth: args.depth,
      includeObsolete: args.include_obsolete,
    }, signal),
  });
}
