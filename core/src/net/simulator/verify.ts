import type { Cost, NodeId } from "../node";
import { shortestPaths, type Topology } from "../topology";
import { entryOf, type RouterTableSnapshot } from "./snapshot";

export interface Mismatch {
    router: NodeId;
    destination: NodeId;
    expected: Cost;
    actual: Cost | undefined;
}

/**
 * Compares every entry against a centralized Dijkstra run.
 *
 * Distances are computed from each destination outwards, so path costs are
 * summed from the destination end, in the same order the routers add the
 * advertised costs to their link costs. Costs then compare exactly even when
 * they are not representable in binary.
 */
export const verifyTables = (topology: Topology, tables: readonly RouterTableSnapshot[]): Mismatch[] => {
    const references = topology.nodes().map((destination) => {
        return [destination, shortestPaths(topology, destination)] as const;
    });

    const mismatches: Mismatch[] = [];
    for (const table of tables) {
        for (const [destination, reference] of references) {
            const expected = reference.get(table.nodeId);
            if (expected === undefined) {
                continue;
            }
            const actual = entryOf(table, destination)?.cost;
            if (actual === undefined || !actual.equals(expected)) {
                mismatches.push({ router: table.nodeId, destination, expected, actual });
            }
        }
    }
    return mismatches;
};
