/**
 * Layer assignment for the step graph.
 */

import { ConfigurationErrorCode, createConfigurationError } from '../errors/index.js';

export interface GraphNode {
  id: string;
}

export interface GraphEdge {
  from: string;
  to: string;
}

export interface TopologyResult {
  /** Maps node ID to its layer index (0-indexed) */
  layerAssignments: Map<string, number>;
  /** Total number of layers in the graph (max layer + 1) */
  layerCount: number;
}

/**
 * Computes layer assignments for nodes in a DAG using Kahn's algorithm.
 *
 * Each node is assigned to the earliest layer where all its dependencies
 * have been satisfied. Nodes left with unresolved dependencies sit on a
 * cycle, which is a configuration error.
 */
export function computeTopologyLayers<N extends GraphNode>(
  nodes: readonly N[],
  edges: readonly GraphEdge[],
): TopologyResult {
  if (nodes.length === 0) {
    return {
      layerAssignments: new Map(),
      layerCount: 0,
    };
  }

  const indegree = new Map<string, number>();
  const adjacency = new Map<string, Set<string>>();

  for (const node of nodes) {
    indegree.set(node.id, 0);
    adjacency.set(node.id, new Set());
  }

  for (const edge of edges) {
    const targets = adjacency.get(edge.from);
    if (!targets || !indegree.has(edge.to) || targets.has(edge.to)) {
      continue;
    }
    targets.add(edge.to);
    indegree.set(edge.to, (indegree.get(edge.to) ?? 0) + 1);
  }

  // Kahn's algorithm with level tracking
  const queue: Array<{ nodeId: string; level: number }> = [];
  for (const [nodeId, degree] of indegree) {
    if (degree === 0) {
      queue.push({ nodeId, level: 0 });
    }
  }

  const levelMap = new Map<string, number>();

  for (let next = queue.shift(); next; next = queue.shift()) {
    const { nodeId, level } = next;
    levelMap.set(nodeId, Math.max(level, levelMap.get(nodeId) ?? 0));

    for (const neighbor of adjacency.get(nodeId) ?? []) {
      const remaining = (indegree.get(neighbor) ?? 0) - 1;
      indegree.set(neighbor, remaining);
      if (remaining === 0) {
        queue.push({ nodeId: neighbor, level: level + 1 });
      }
    }
  }

  const unresolved = nodes.filter((node) => !levelMap.has(node.id));
  if (unresolved.length > 0) {
    const names = unresolved.map((node) => node.id).join(', ');
    throw createConfigurationError(
      ConfigurationErrorCode.CYCLIC_DEPENDENCY,
      `Step graph contains a cycle through: ${names}.`,
      { suggestion: 'A step must not read, directly or transitively, a key it writes.' },
    );
  }

  const maxLevel = Math.max(...levelMap.values());

  return {
    layerAssignments: levelMap,
    layerCount: maxLevel + 1,
  };
}
