import { ObjectMap } from "@core/object";
import type { Cost, NodeId } from "../node";

/**
 * Destination to cost mapping advertised by one router to its neighbors.
 * Carries no next hops.
 */
export class DistanceVector {
    #costs = new ObjectMap<NodeId, Cost>();

    constructor(entries: Iterable<readonly [NodeId, Cost]>) {
        for (const [destination, cost] of entries) {
            this.#costs.set(destination, cost);
        }
    }

    get size(): number {
        return this.#costs.size;
    }

    get(destination: NodeId): Cost | undefined {
        return this.#costs.get(destination);
    }

    entries(): [NodeId, Cost][] {
        return [...this.#costs.entries()];
    }
}
