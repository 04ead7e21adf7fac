import type { EdgeRelation, GraphEdge, GraphNode, NodeType } from './types';

/**
 * Request-scoped directed graph with adjacency keyed by node id.
 * Re-adding a node or a (source, target) edge is a no-op; the first insertion wins.
 */
export class KnowledgeGraph {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly adjacency = new Map<string, Map<string, GraphEdge>>();

  addNode(
    id: string,
    type: NodeType,
    label: string,
    attributes: Record<string, string> = {},
  ): GraphNode {
    const existing = this.nodes.get(id);
    if (existing) return existing;

    const node: GraphNode = { id, type, label, attributes: { ...attributes } };
    this.nodes.set(id, node);
    this.adjacency.set(id, new Map());
    return node;
  }

  addEdge(source: string, target: string, relation: EdgeRelation, why?: string): void {
    const out = this.adjacency.get(source);
    if (!out || !this.nodes.has(target)) {
      throw new Error(`Cannot link ${source} -> ${target}: both nodes must exist`);
    }
    if (out.has(target)) return;
    out.set(target, why === undefined ? { source, target, relation } : { source, target, relation, why });
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  hasEdge(source: string, target: string): boolean {
    return this.adjacency.get(source)?.has(target) ?? false;
  }

  /** Outgoing edges in insertion order; empty for unknown nodes. */
  outEdges(source: string): GraphEdge[] {
    return [...(this.adjacency.get(source)?.values() ?? [])];
  }

  /** Targets reached from `source` through edges of one relation, in insertion order. */
  successors(source: string, relation: EdgeRelation): string[] {
    return this.outEdges(source)
      .filter((edge) => edge.relation === relation)
      .map((edge) => edge.target);
  }

  nodeCount(): number {
    return this.nodes.size;
  }

  edgeCount(): number {
    let total = 0;
    for (const out of this.adjacency.values()) total += out.size;
    return total;
  }

  nodesOfType(type: NodeType): GraphNode[] {
    return [...this.nodes.values()].filter((node) => node.type === type);
  }
}
