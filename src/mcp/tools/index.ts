/**
 * Aggregator that registers all MCP tools.
 */

import type { AppContext } from '../../server.js';
import type { ToolHost } from './dualRegister.js';
import { registerTermTools } from './termTools.js';
import { registerOntologyTools } from './ontologyTools.js';
import { registerHierarchyTools } from './hierarchyTools.js';
import { registerSimilarityTools } from './similarityTools.js';

export function registerAllTools(host: ToolHost, ctx: AppContext): void {
  registerTermTools(host, ctx);
  registerOntologyTools(host, ctx);
  registerHierarchyTools(host, ctx);
  registerSimilarityTools(host, ctx);
}
