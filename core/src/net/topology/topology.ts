import { Err, Ok, Result } from "oxide.ts";
import { ObjectMap, ObjectSet } from "@core/object";
import { Cost, NodeId } from "../node";
import { configurationError, fromZodIssues, type ConfigurationError } from "../error";
import { TopologyDescription, type TopologyInput } from "./description";

export interface Link {
    source: NodeId;
    destination: NodeId;
    cost: Cost;
}

const linkName = (a: NodeId, b: NodeId): string => `${a.display()}-${b.display()}`;

/**
 * Fixed, connected, undirected weighted graph of routers.
 * Instances are only created through {@link Topology.fromDescription} and are never mutated.
 */
export class Topology {
    #nodes: readonly NodeId[];
    #adjacency: ObjectMap<NodeId, ObjectMap<NodeId, Cost>>;

    private constructor(nodes: NodeId[], adjacency: ObjectMap<NodeId, ObjectMap<NodeId, Cost>>) {
        this.#nodes = Object.freeze(nodes);
        this.#adjacency = adjacency;
    }

    static parse(input: unknown): Result<Topology, ConfigurationError> {
        const parsed = TopologyDescription.schema.safeParse(input);
        if (!parsed.success) {
            return Err(fromZodIssues(parsed.error.issues));
        }
        return Topology.fromDescription(parsed.data);
    }

    static fromDescription(description: TopologyDescription): Result<Topology, ConfigurationError> {
        const adjacency = new ObjectMap<NodeId, ObjectMap<NodeId, Cost>>();
        const neighborsOf = (id: NodeId): ObjectMap<NodeId, Cost> => {
            const existing = adjacency.get(id);
            if (existing !== undefined) {
                return existing;
            }
            const created = new ObjectMap<NodeId, Cost>();
            adjacency.set(id, created);
            return created;
        };

        for (const router of description.routers) {
            neighborsOf(router);
        }

        for (const { source, destination, cost } of description.links) {
            const name = linkName(source, destination);
            if (source.equals(destination)) {
                return Err(configurationError(`link ${name}: self-loops are not allowed`));
            }
            if (!cost.isFinite() || cost.get() <= 0) {
                return Err(configurationError(`link ${name}: cost must be finite and greater than 0`));
            }

            const current = neighborsOf(source).get(destination);
            if (current !== undefined && !current.equals(cost)) {
                return Err(
                    configurationError(`link ${name}: conflicting costs ${current.display()} and ${cost.display()}`),
                );
            }
            neighborsOf(source).set(destination, cost);
            neighborsOf(destination).set(source, cost);
        }

        const nodes = NodeId.sorted(adjacency.keys());
        if (nodes.length === 0) {
            return Err(configurationError("topology has no routers"));
        }

        const unreachable = Topology.#unreachableFrom(nodes[0], nodes, adjacency);
        if (unreachable.length > 0) {
            const names = unreachable.map((id) => id.display()).join(", ");
            return Err(
                configurationError(`topology is disconnected: ${names} unreachable from ${nodes[0].display()}`),
            );
        }

        return Ok(new Topology(nodes, adjacency));
    }

    static #unreachableFrom(
        start: NodeId,
        nodes: readonly NodeId[],
        adjacency: ObjectMap<NodeId, ObjectMap<NodeId, Cost>>,
    ): NodeId[] {
        const visited = new ObjectSet<NodeId>([start]);
        const queue = [start];
        for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
            for (const neighbor of adjacency.get(current)?.keys() ?? []) {
                if (!visited.has(neighbor)) {
                    visited.add(neighbor);
                    queue.push(neighbor);
                }
            }
        }
        return nodes.filter((id) => !visited.has(id));
    }

    get size(): number {
        return this.#nodes.length;
    }

    nodes(): readonly NodeId[] {
        return this.#nodes;
    }

    has(id: NodeId): boolean {
        return this.#adjacency.has(id);
    }

    neighbors(id: NodeId): [NodeId, Cost][] {
        const links = this.#adjacency.get(id);
        if (links === undefined) {
            return [];
        }
        return [...links.entries()].sort(([a], [b]) => NodeId.compare(a, b));
    }

    linkCost(a: NodeId, b: NodeId): Cost | undefined {
        return this.#adjacency.get(a)?.get(b);
    }

    // Each undirected link once, with source ordered before destination.
    links(): Link[] {
        return this.#nodes.flatMap((source) =>
            this.neighbors(source)
                .filter(([destination]) => source.lessThan(destination))
                .map(([destination, cost]) => ({ source, destination, cost })),
        );
    }
}

type NodeIdLike = NodeId | string | number;
type CostLike = Cost | number;

const toNodeInput = (id: NodeIdLike): string | number => (id instanceof NodeId ? id.label() : id);
const toCostInput = (cost: CostLike): number => (cost instanceof Cost ? cost.get() : cost);

export class TopologyBuilder {
    #routers: (string | number)[] = [];
    #links: { source: string | number; destination: string | number; cost: number }[] = [];

    addRouter(id: NodeIdLike): this {
        this.#routers.push(toNodeInput(id));
        return this;
    }

    addLink(source: NodeIdLike, destination: NodeIdLike, cost: CostLike): this {
        this.#links.push({
            source: toNodeInput(source),
            destination: toNodeInput(destination),
            cost: toCostInput(cost),
        });
        return this;
    }

    build(): Result<Topology, ConfigurationError> {
        const input: TopologyInput = { routers: this.#routers, links: this.#links };
        return Topology.parse(input);
    }
}
