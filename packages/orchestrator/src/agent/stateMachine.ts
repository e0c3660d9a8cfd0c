/**
 * Graph topology for a conversation run
 */

import type { GraphNode, InterruptNode, RoutedStage } from '../contracts/index.js';
import { FatalError } from '../errors/index.js';

export const ENTRY_NODE: GraphNode = 'parse';

// Outgoing edges per node. The router's targets are the only conditional ones.
const EDGES: Record<GraphNode, readonly GraphNode[]> = {
  parse: ['route'],
  route: ['scheduling', 'knowledge', 'contact', 'compose'],
  scheduling: ['route'],
  knowledge: ['route'],
  contact: ['route'],
  compose: ['review'],
  review: ['send', 'end', 'route'],
  send: ['end'],
  end: [],
};

// Node that owns each interrupt and gets resumed with the human's answer
const INTERRUPT_OWNERS: Record<InterruptNode, GraphNode> = {
  review: 'review',
  book_review: 'scheduling',
};

export function canFollow(from: GraphNode, to: GraphNode): boolean {
  return EDGES[from].includes(to);
}

export function assertEdge(from: GraphNode, to: GraphNode): void {
  if (!canFollow(from, to)) {
    throw new FatalError(`No edge from ${from} to ${to}`);
  }
}

export function isTerminalNode(node: GraphNode): boolean {
  return EDGES[node].length === 0;
}

export function ownerOf(interrupt: InterruptNode): GraphNode {
  return INTERRUPT_OWNERS[interrupt];
}

export function nodeForStage(stage: RoutedStage): GraphNode {
  return stage;
}
