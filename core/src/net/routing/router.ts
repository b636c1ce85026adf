import { Err, Ok, Result } from "oxide.ts";
import { ObjectMap } from "@core/object";
import { Cost, NodeId } from "../node";
import { configurationError, type ConfigurationError } from "../error";
import { RoutingTable, type RoutingEntry } from "./table";
import type { DistanceVector } from "./vector";

/**
 * One network node. It knows only its own links and learns everything else
 * from the vectors its neighbors advertise.
 */
export class Router {
    #id: NodeId;
    #links = new ObjectMap<NodeId, Cost>();
    #table: RoutingTable;

    constructor(args: { id: NodeId; links: Iterable<readonly [NodeId, Cost]>; destinations: Iterable<NodeId> }) {
        this.#id = args.id;
        for (const [neighbor, cost] of args.links) {
            this.#links.set(neighbor, cost);
        }
        this.#table = RoutingTable.initialize(args.id, this.#links.entries(), args.destinations);
    }

    get id(): NodeId {
        return this.#id;
    }

    neighbors(): NodeId[] {
        return NodeId.sorted(this.#links.keys());
    }

    currentVector(): DistanceVector {
        return this.#table.asVector();
    }

    receiveAndRelax(from: NodeId, vector: DistanceVector): Result<boolean, ConfigurationError> {
        const linkCost = this.#links.get(from);
        if (linkCost === undefined) {
            return Err(
                configurationError(`router ${this.#id.display()} received a vector from non-neighbor ${from.display()}`),
            );
        }
        return Ok(this.#table.relax(from, vector, linkCost));
    }

    table(): readonly RoutingEntry[] {
        return this.#table.snapshot();
    }

    toString(): string {
        return `Router(${this.#id.display()})`;
    }
}
