import { MultiDirectedGraph } from 'graphology';
import type { ClearResult } from '../types/index.js';
import type {
    GraphCounts,
    GraphProperties,
    GraphStore,
    GraphTransaction,
    GraphWrite,
    NodeUpsert,
    RelationshipUpsert,
    StoredNode,
    StoredRelationship,
    WriteResult,
} from './store.js';
import { indexName } from './cypher.js';

type NodeState = {
    label: string;
    properties: GraphProperties;
    scopes: string[];
};

type EdgeState = {
    type: string;
    properties: GraphProperties;
    scopes: string[];
};

type Undo = () => void;

function withScope(scopes: readonly string[], scope: string): string[] {
    return scopes.includes(scope) ? [...scopes] : [...scopes, scope];
}

/**
 * In-process property graph with the same semantics as the Neo4j store.
 * Backs tests and dry runs. Nodes are keyed by id; an upsert under a new
 * label relabels the node.
 */
export class MemoryGraphStore implements GraphStore {
    readonly kind = 'memory';
    private readonly graph = new MultiDirectedGraph<NodeState, EdgeState>();
    private readonly indexes = new Set<string>();
    private closed = false;

    async ensureIndex(label: string): Promise<string> {
        this.assertOpen();
        const name = indexName(label);
        this.indexes.add(name);
        return name;
    }

    getIndexes(): string[] {
        return Array.from(this.indexes).sort();
    }

    async beginTransaction(): Promise<GraphTransaction> {
        this.assertOpen();
        return new MemoryTransaction(this);
    }

    /**
     * Apply a write to the live graph, returning the step that reverts it.
     */
    apply(write: GraphWrite): { result: WriteResult; undo: Undo } {
        this.assertOpen();
        return write.kind === 'upsert-node' ? this.upsertNode(write) : this.upsertRelationship(write);
    }

    private upsertNode(write: NodeUpsert): { result: WriteResult; undo: Undo } {
        const { graph } = this;

        if (graph.hasNode(write.id)) {
            const previous = graph.getNodeAttributes(write.id);
            graph.replaceNodeAttributes(write.id, {
                label: write.label,
                properties: { ...write.properties },
                scopes: withScope(previous.scopes, write.scope),
            });
            return {
                result: { matched: true, created: false },
                undo: () => graph.replaceNodeAttributes(write.id, previous),
            };
        }

        graph.addNode(write.id, { label: write.label, properties: { ...write.properties }, scopes: [write.scope] });
        return {
            result: { matched: true, created: true },
            undo: () => graph.dropNode(write.id),
        };
    }

    private upsertRelationship(write: RelationshipUpsert): { result: WriteResult; undo: Undo } {
        const { graph } = this;

        const endpointsPresent =
            graph.hasNode(write.sourceId) &&
            graph.hasNode(write.targetId) &&
            graph.getNodeAttribute(write.sourceId, 'label') === write.sourceLabel &&
            graph.getNodeAttribute(write.targetId, 'label') === write.targetLabel;
        if (!endpointsPresent) {
            return { result: { matched: false, created: false }, undo: () => undefined };
        }

        const existing = graph.hasEdge(write.id)
            ? {
                  source: graph.source(write.id),
                  target: graph.target(write.id),
                  attributes: graph.getEdgeAttributes(write.id),
              }
            : null;

        const sameEdge =
            existing !== null &&
            existing.source === write.sourceId &&
            existing.target === write.targetId &&
            existing.attributes.type === write.type;

        if (existing && sameEdge) {
            graph.replaceEdgeAttributes(write.id, {
                type: write.type,
                properties: { ...write.properties },
                scopes: withScope(existing.attributes.scopes, write.scope),
            });
            return {
                result: { matched: true, created: false },
                undo: () => graph.replaceEdgeAttributes(write.id, existing.attributes),
            };
        }

        if (existing) {
            graph.dropEdge(write.id);
        }
        graph.addDirectedEdgeWithKey(write.id, write.sourceId, write.targetId, {
            type: write.type,
            properties: { ...write.properties },
            scopes: [write.scope],
        });
        return {
            result: { matched: true, created: true },
            undo: () => {
                graph.dropEdge(write.id);
                if (existing) {
                    graph.addDirectedEdgeWithKey(write.id, existing.source, existing.target, existing.attributes);
                }
            },
        };
    }

    async clearScope(scope: string): Promise<ClearResult> {
        this.assertOpen();
        const { graph } = this;
        let nodesDeleted = 0;
        let relationshipsDeleted = 0;

        for (const edge of graph.edges()) {
            const { scopes } = graph.getEdgeAttributes(edge);
            if (!scopes.includes(scope)) continue;
            const remaining = scopes.filter((s) => s !== scope);
            if (remaining.length === 0) {
                graph.dropEdge(edge);
                relationshipsDeleted++;
            } else {
                graph.setEdgeAttribute(edge, 'scopes', remaining);
            }
        }

        for (const node of graph.nodes()) {
            const { scopes } = graph.getNodeAttributes(node);
            if (!scopes.includes(scope)) continue;
            const remaining = scopes.filter((s) => s !== scope);
            if (remaining.length === 0) {
                // Detach delete: incident relationships from other scopes go too
                relationshipsDeleted += graph.edges(node).length;
                graph.dropNode(node);
                nodesDeleted++;
            } else {
                graph.setNodeAttribute(node, 'scopes', remaining);
            }
        }

        return { nodesDeleted, relationshipsDeleted };
    }

    async countScope(scope: string): Promise<GraphCounts> {
        this.assertOpen();
        return {
            nodes: this.graph.filterNodes((_, attributes) => attributes.scopes.includes(scope)).length,
            relationships: this.graph.filterEdges((_, attributes) => attributes.scopes.includes(scope)).length,
        };
    }

    async getNode(id: string, scope: string): Promise<StoredNode | null> {
        this.assertOpen();
        if (!this.graph.hasNode(id)) return null;
        const attributes = this.graph.getNodeAttributes(id);
        if (!attributes.scopes.includes(scope)) return null;
        return { id, labels: [attributes.label], properties: { ...attributes.properties }, scopes: [...attributes.scopes] };
    }

    async getRelationship(id: string, scope: string): Promise<StoredRelationship | null> {
        this.assertOpen();
        if (!this.graph.hasEdge(id)) return null;
        const attributes = this.graph.getEdgeAttributes(id);
        if (!attributes.scopes.includes(scope)) return null;
        return {
            id,
            type: attributes.type,
            sourceId: this.graph.source(id),
            targetId: this.graph.target(id),
            properties: { ...attributes.properties },
            scopes: [...attributes.scopes],
        };
    }

    async listLabels(scope: string): Promise<string[]> {
        this.assertOpen();
        const labels = new Set<string>();
        this.graph.forEachNode((_, attributes) => {
            if (attributes.scopes.includes(scope)) labels.add(attributes.label);
        });
        return Array.from(labels).sort();
    }

    async listRelationshipTypes(scope: string): Promise<string[]> {
        this.assertOpen();
        const types = new Set<string>();
        this.graph.forEachEdge((_, attributes) => {
            if (attributes.scopes.includes(scope)) types.add(attributes.type);
        });
        return Array.from(types).sort();
    }

    /**
     * Totals across all scopes.
     */
    size(): GraphCounts {
        return { nodes: this.graph.order, relationships: this.graph.size };
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new Error('Graph store is closed');
        }
    }
}

/**
 * Writes land on the live graph immediately; rollback replays the undo log
 * in reverse.
 */
class MemoryTransaction implements GraphTransaction {
    private readonly undoLog: Undo[] = [];
    private open = true;

    constructor(private readonly store: MemoryGraphStore) {}

    async run(write: GraphWrite): Promise<WriteResult> {
        this.assertOpen();
        const { result, undo } = this.store.apply(write);
        this.undoLog.push(undo);
        return result;
    }

    async commit(): Promise<void> {
        this.assertOpen();
        this.open = false;
        this.undoLog.length = 0;
    }

    async rollback(): Promise<void> {
        if (!this.open) return;
        this.open = false;
        for (const undo of this.undoLog.reverse()) {
            undo();
        }
        this.undoLog.length = 0;
    }

    private assertOpen(): void {
        if (!this.open) {
            throw new Error('Transaction is no longer open');
        }
    }
}
