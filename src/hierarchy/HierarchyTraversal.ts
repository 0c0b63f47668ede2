/**
 * Breadth-first walks over a term's parent or child edges.
 *
 * Each level expands every frontier node by fetching all pages of its direct
 * neighbours. Siblings within a level may be fetched concurrently; results
 * are merged in frontier order so the output is identical to a sequential
 * walk. A visited set keyed by IRI makes diamonds and cycles harmless.
 */

import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { NetworkError, UpstreamError, serializeError } from '../ols/errors.js';
import type { OntologyGateway } from '../ols/OlsApi.js';
import type { HierarchyDirection, HierarchyEdge, TermDescriptor } from '../ols/types.js';

export interface TraversalLimits {
  /** Levels to walk; 1 = direct neighbours only */
  maxDepth: number;
  /** Stop after this many terms and flag the result as truncated */
  maxResults: number;
  /** Page size for neighbour requests */
  pageSize: number;
  /** Frontier nodes expanded concurrently */
  concurrency: number;
}

export interface TraversalOptions extends Partial<TraversalLimits> {
  /** Obsolete neighbours are skipped, and not walked through, unless set */
  includeObsolete?: boolean | undefined;
  signal?: AbortSignal | undefined;
}

export interface TraversedTerm extends TermDescriptor {
  /** BFS depth at which the term was first discovered */
  depth: number;
}

export interface TraversalResult {
  ontology: string;
  direction: HierarchyDirection;
  root: TermDescriptor;
  maxDepth: number;
  terms: TraversedTerm[];
  edges: HierarchyEdge[];
  truncated: boolean;
}

export const DEFAULT_TRAVERSAL_LIMITS: TraversalLimits = {
  maxDepth: 1,
  maxResults: 500,
  pageSize: 100,
  concurrency: 4,
};

export class HierarchyTraversal {
  private readonly defaults: TraversalLimits;
  private readonly log: Logger;

  constructor(
    private readonly gateway: OntologyGateway,
    defaults: Partial<TraversalLimits> = {},
    logger?: Logger,
  ) {
    this.defaults = { ...DEFAULT_TRAVERSAL_LIMITS, ...defaults };
    this.log = (logger ?? createSilentLogger()).child({ component: 'hierarchy' });
  }

  getAncestors(ontology: string, iri: string, options: TraversalOptions = {}): Promise<TraversalResult> {
    return this.walk('parents', ontology, iri, options);
  }

  getChildren(ontology: string, iri: string, options: TraversalOptions = {}): Promise<TraversalResult> {
    return this.walk('children', ontology, iri, options);
  }

  /**
   * Every direct neighbour of one term, across all pages, upstream order,
   * each IRI once.
   */
  async getDirectNeighbours(
    direction: HierarchyDirection,
    ontology: string,
    iri: string,
    options: { pageSize?: number; signal?: AbortSignal | undefined } = {},
  ): Promise<TermDescriptor[]> {
    const pageSize = options.pageSize ?? this.defaults.pageSize;
    const seen = new Set<string>();
    const terms: TermDescriptor[] = [];
    let page = 0;

    for (;;) {
      const result = await this.gateway.getNeighbourPage(direction, ontology, iri, page, pageSize, options.signal);
      for (const term of result.items) {
        if (seen.has(term.iri)) continue;
        seen.add(term.iri);
        terms.push(term);
      }
      // nextPage must advance, or an upstream that ignores `page` would loop forever
      if (!result.hasMore || result.nextPage === null || result.nextPage <= page || result.items.length === 0) {
        break;
      }
      page = result.nextPage;
    }

    return terms;
  }

  private async walk(
    direction: HierarchyDirection,
    ontology: string,
    iri: string,
    options: TraversalOptions,
  ): Promise<TraversalResult> {
    const limits: TraversalLimits = {
      maxDepth: options.maxDepth ?? this.defaults.maxDepth,
      maxResults: options.maxResults ?? this.defaults.maxResults,
      pageSize: options.pageSize ?? this.defaults.pageSize,
      concurrency: options.concurrency ?? this.defaults.concurrency,
    };

    const includeObsolete = options.includeObsolete ?? false;

    // NotFoundError for the start term propagates unchanged
    const root = await this.gateway.getTerm(ontology, iri, options.signal);

    // Aborted when one branch fails so its siblings stop too
    const controller = new AbortController();
    const onAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const visited = new Set<string>([iri, root.iri]);
    const edgeKeys = new Set<string>();
    const terms: TraversedTerm[] = [];
    const edges: HierarchyEdge[] = [];
    let frontier = [root.iri];
    let truncated = false;

    try {
      for (let depth = 1; depth <= limits.maxDepth && frontier.length > 0 && !truncated; depth++) {
        const neighbourLists = await this.expandLevel(direction, ontology, frontier, depth, limits, controller);
        const next: string[] = [];

        for (const [i, from] of frontier.entries()) {
          for (const term of neighbourLists[i] ?? []) {
            if (term.obsolete && !includeObsolete) continue;
            const edge: HierarchyEdge = direction === 'children'
              ? { parent: from, child: term.iri, ontology: root.ontology }
              : { parent: term.iri, child: from, ontology: root.ontology };
            const edgeKey = `${edge.parent}\u0000${edge.child}`;
            if (!edgeKeys.has(edgeKey)) {
              edgeKeys.add(edgeKey);
              edges.push(edge);
            }

            if (visited.has(term.iri)) continue;
            if (terms.length >= limits.maxResults) {
              truncated = true;
              break;
            }
            visited.add(term.iri);
            terms.push({ ...term, depth });
            next.push(term.iri);
          }
          if (truncated) break;
        }

        this.log.debug({ direction, ontology, depth, discovered: next.length }, 'Traversal level complete');
        frontier = next;
      }
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }

    return {
      ontology: root.ontology,
      direction,
      root,
      maxDepth: limits.maxDepth,
      terms,
      edges,
      truncated,
    };
  }

  /**
   * Fetch the neighbours of every frontier node, `concurrency` at a time.
   * The returned lists line up with `frontier`.
   */
  private async expandLevel(
    direction: HierarchyDirection,
    ontology: string,
    frontier: string[],
    depth: number,
    limits: TraversalLimits,
    controller: AbortController,
  ): Promise<TermDescriptor[][]> {
    const lists: TermDescriptor[][] = [];

    for (let start = 0; start < frontier.length; start += limits.concurrency) {
      const chunk = frontier.slice(start, start + limits.concurrency);
      const results = await Promise.all(
        chunk.map(async (node) => {
          try {
            return await this.getDirectNeighbours(direction, ontology, node, {
              pageSize: limits.pageSize,
              signal: controller.signal,
            });
          } catch (err) {
            const alreadyAborted = controller.signal.aborted;
            controller.abort();
            throw alreadyAborted ? err : midTraversalFailure(err, node, depth, direction);
          }
        }),
      );
      lists.push(...results);
    }

    return lists;
  }
}

function midTraversalFailure(err: unknown, node: string, depth: number, direction: HierarchyDirection): Error {
  // Caller cancellation is reported as such, not as an upstream fault
  if (err instanceof NetworkError && err.details?.aborted === true) {
    return err;
  }
  const cause = serializeError(err);
  return new UpstreamError(
    `Traversal of ${direction} failed at depth ${depth} while expanding ${node}: ${cause.message}`,
    { term: node, depth, direction, cause },
  );
}
