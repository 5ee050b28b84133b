import { DirectedGraph } from 'graphology';
import { edgeKey, type CitationEdge, type Entity, type GraphNotice } from '../types/index.js';

type NodeAttributes = { entity: Entity };
type EdgeAttributes = { edge: CitationEdge };

/**
 * Read-only citation graph over graphology.
 *
 * Built once from a complete entity and edge set; there are no mutators, and every entity and
 * edge handed out is frozen, so one instance can serve any number of analytics queries.
 * Every edge endpoint is a node: construction fails otherwise.
 */
export class CitationGraph {
    private readonly graph = new DirectedGraph<NodeAttributes, EdgeAttributes>({ allowSelfLoops: true });
    private readonly keys: readonly string[];
    private readonly notices: readonly GraphNotice[];

    constructor(entities: Iterable<Entity>, edges: Iterable<CitationEdge>) {
        for (const entity of entities) {
            if (this.graph.hasNode(entity.key)) {
                throw new Error(`Duplicate entity ${entity.key}`);
            }
            this.graph.addNode(entity.key, { entity: deepFreeze(structuredClone(entity)) });
        }

        for (const edge of edges) {
            if (!this.graph.hasNode(edge.citing) || !this.graph.hasNode(edge.cited)) {
                throw new Error(`Edge ${edgeKey(edge.citing, edge.cited)} references an unknown entity`);
            }
            this.graph.addDirectedEdgeWithKey(edgeKey(edge.citing, edge.cited), edge.citing, edge.cited, {
                edge: deepFreeze(structuredClone(edge)),
            });
        }

        this.keys = Object.freeze(this.graph.nodes().sort());
        this.notices = Object.freeze(this.collectNotices());
    }

    /** Number of entities */
    get order(): number {
        return this.graph.order;
    }

    /** Number of edges */
    get size(): number {
        return this.graph.size;
    }

    hasEntity(key: string): boolean {
        return this.graph.hasNode(key);
    }

    getEntity(key: string): Entity | undefined {
        return this.graph.hasNode(key) ? this.graph.getNodeAttributes(key).entity : undefined;
    }

    /** All entity keys, ascending */
    entityKeys(): readonly string[] {
        return this.keys;
    }

    /** All entities, ascending by key */
    entities(): Entity[] {
        return this.keys.map((key) => this.graph.getNodeAttributes(key).entity);
    }

    /** All edges, ordered by citing key, ordinal, cited key */
    edges(): CitationEdge[] {
        return this.keys.flatMap((key) => this.outgoing(key));
    }

    /** Edges leaving `key`, in ordinal order */
    outgoing(key: string): CitationEdge[] {
        if (!this.graph.hasNode(key)) return [];
        return this.graph
            .mapOutEdges(key, (_edge, attributes) => attributes.edge)
            .sort((a, b) => a.ordinal - b.ordinal || compareKeys(a.cited, b.cited));
    }

    /** Edges arriving at `key`, ordered by citing key */
    incoming(key: string): CitationEdge[] {
        if (!this.graph.hasNode(key)) return [];
        return this.graph
            .mapInEdges(key, (_edge, attributes) => attributes.edge)
            .sort((a, b) => compareKeys(a.citing, b.citing));
    }

    /** Distinct entities citing `key`, self-citation excluded */
    inDegree(key: string): number {
        return this.incoming(key).filter((edge) => edge.citing !== key).length;
    }

    /** Distinct entities `key` cites, self-citation excluded */
    outDegree(key: string): number {
        return this.outgoing(key).filter((edge) => edge.cited !== key).length;
    }

    /** Dangling references (resolved to stubs) and self-citations */
    getNotices(): readonly GraphNotice[] {
        return this.notices;
    }

    private collectNotices(): GraphNotice[] {
        const notices: GraphNotice[] = [];
        for (const edge of this.edges()) {
            if (edge.citing === edge.cited) {
                notices.push({ kind: 'self_citation', key: edge.citing, source: edge.source });
            }
            if (this.graph.getNodeAttributes(edge.cited).entity.isStub) {
                notices.push({ kind: 'dangling_reference', citing: edge.citing, cited: edge.cited, source: edge.source });
            }
        }
        return notices;
    }
}

export function compareKeys(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
