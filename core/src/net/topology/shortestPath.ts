import { ObjectMap, ObjectSet } from "@core/object";
import { Cost, NodeId } from "../node";
import type { Topology } from "./topology";

/**
 * Centralized Dijkstra over the whole topology. The simulator never calls this;
 * it is the independent reference that converged tables are checked against.
 */
export const shortestPaths = (topology: Topology, source: NodeId): ObjectMap<NodeId, Cost> => {
    const distances = new ObjectMap<NodeId, Cost>();
    for (const id of topology.nodes()) {
        distances.set(id, id.equals(source) ? Cost.zero() : Cost.infinity());
    }

    const settled = new ObjectSet<NodeId>();
    while (settled.size < topology.size) {
        let next: [NodeId, Cost] | undefined;
        for (const [id, cost] of distances.entries()) {
            if (settled.has(id) || cost.isInfinite()) {
                continue;
            }
            if (next === undefined || cost.lessThan(next[1])) {
                next = [id, cost];
            }
        }
        if (next === undefined) {
            break;
        }

        const [current, currentCost] = next;
        settled.add(current);
        for (const [neighbor, linkCost] of topology.neighbors(current)) {
            const candidate = currentCost.add(linkCost);
            const known = distances.get(neighbor);
            if (known === undefined || candidate.lessThan(known)) {
                distances.set(neighbor, candidate);
            }
        }
    }

    return distances;
};
