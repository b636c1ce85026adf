import { ObjectMap } from "@core/object";
import { Cost, NodeId } from "../node";
import { DistanceVector } from "./vector";

export interface RoutingEntry {
    readonly destination: NodeId;
    readonly cost: Cost;
    // Absent while the destination is unreachable.
    readonly nextHop: NodeId | undefined;
}

const entry = (destination: NodeId, cost: Cost, nextHop: NodeId | undefined): RoutingEntry => {
    return Object.freeze({ destination, cost, nextHop });
};

export class RoutingTable {
    #self: NodeId;
    #entries = new ObjectMap<NodeId, RoutingEntry>();

    private constructor(self: NodeId) {
        this.#self = self;
    }

    static initialize(
        self: NodeId,
        neighbors: Iterable<readonly [NodeId, Cost]>,
        destinations: Iterable<NodeId>,
    ): RoutingTable {
        const table = new RoutingTable(self);
        for (const destination of NodeId.sorted(destinations)) {
            table.#entries.set(destination, entry(destination, Cost.infinity(), undefined));
        }
        for (const [neighbor, cost] of neighbors) {
            table.#entries.set(neighbor, entry(neighbor, cost, neighbor));
        }
        table.#entries.set(self, entry(self, Cost.zero(), self));
        return table;
    }

    get self(): NodeId {
        return this.#self;
    }

    get(destination: NodeId): RoutingEntry | undefined {
        return this.#entries.get(destination);
    }

    /**
     * Bellman-Ford relaxation against the vector advertised by `via`.
     * Only a strictly cheaper path replaces an entry, so on equal cost the
     * recorded next hop stays.
     *
     * @returns whether any entry changed
     */
    relax(via: NodeId, advertised: DistanceVector, linkCost: Cost): boolean {
        let changed = false;
        for (const [destination, advertisedCost] of advertised.entries()) {
            if (destination.equals(this.#self)) {
                continue;
            }

            const candidate = linkCost.add(advertisedCost);
            const current = this.#entries.get(destination)?.cost ?? Cost.infinity();
            if (candidate.lessThan(current)) {
                this.#entries.set(destination, entry(destination, candidate, via));
                changed = true;
            }
        }
        return changed;
    }

    // Entries sorted by destination. The entries are frozen and the array is a fresh copy.
    snapshot(): readonly RoutingEntry[] {
        const entries = [...this.#entries.values()].sort((a, b) => NodeId.compare(a.destination, b.destination));
        return Object.freeze(entries);
    }

    asVector(): DistanceVector {
        return new DistanceVector(this.snapshot().map(({ destination, cost }) => [destination, cost] as const));
    }
}
