import type { NodeId } from "../node";
import type { RoutingEntry } from "../routing";

export interface RouterTableSnapshot {
    readonly nodeId: NodeId;
    // Sorted by destination.
    readonly entries: readonly RoutingEntry[];
}

export interface RoundSnapshot {
    // 0 is the seeded state before any exchange.
    readonly round: number;
    // Sorted by router id.
    readonly tables: readonly RouterTableSnapshot[];
}

export interface SimulationResult {
    readonly snapshots: readonly RoundSnapshot[];
    // First round in which no table changed.
    readonly convergedAt: number;
    readonly finalTables: readonly RouterTableSnapshot[];
}

export const tableOf = (snapshot: RoundSnapshot, nodeId: NodeId): RouterTableSnapshot | undefined => {
    return snapshot.tables.find((table) => table.nodeId.equals(nodeId));
};

export const entryOf = (table: RouterTableSnapshot, destination: NodeId): RoutingEntry | undefined => {
    return table.entries.find((entry) => entry.destination.equals(destination));
};
