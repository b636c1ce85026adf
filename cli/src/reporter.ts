import { match } from "ts-pattern";
import {
    SimulationErrorType,
    type Mismatch,
    type RoundSnapshot,
    type RouterTableSnapshot,
    type SimulationError,
    type SimulationResult,
    type Topology,
} from "@core/net";

const DESTINATION_WIDTH = "Destination".length;
const COST_WIDTH = "Cost".length;
const NEXT_HOP_WIDTH = "Next Hop".length;

// Extra padding goes to the right when it cannot be split evenly.
export const center = (text: string, width: number): string => {
    if (text.length >= width) {
        return text;
    }
    const left = Math.floor((width - text.length) / 2);
    return " ".repeat(left) + text + " ".repeat(width - text.length - left);
};

export const formatLinks = (topology: Topology): string[] => {
    const links = topology.links().map(({ source, destination, cost }) => {
        return `${source.display()}-${destination.display()}: ${cost.display()}`;
    });
    return ["Link costs:", ...links];
};

export const formatTable = (table: RouterTableSnapshot): string[] => {
    const rows = table.entries.map(({ destination, cost, nextHop }) => {
        const row = [
            center(destination.display(), DESTINATION_WIDTH),
            center(cost.display(), COST_WIDTH),
            center(nextHop?.display() ?? "-", NEXT_HOP_WIDTH),
        ].join(" | ");
        return row.trimEnd();
    });

    return [
        `Routing table for router ${table.nodeId.display()}:`,
        "Destination | Cost | Next Hop",
        "-".repeat(35),
        ...rows,
    ];
};

export const formatRound = (snapshot: RoundSnapshot): string[] => {
    const title = snapshot.round === 0 ? "Initial tables" : `Round ${snapshot.round}`;
    const tables = snapshot.tables.flatMap((table) => ["", ...formatTable(table)]);
    return [title, "-".repeat(20), ...tables];
};

export const formatMismatches = (mismatches: readonly Mismatch[]): string[] => {
    if (mismatches.length === 0) {
        return ["Converged tables match the centralized shortest paths"];
    }
    return mismatches.map(({ router, destination, expected, actual }) => {
        const got = actual?.display() ?? "nothing";
        return `Mismatch at router ${router.display()} for ${destination.display()}: expected ${expected.display()}, got ${got}`;
    });
};

export const formatResult = (result: SimulationResult): string[] => {
    return [`Network converged at round ${result.convergedAt}`];
};

export const formatError = (error: SimulationError): string[] => {
    return match(error)
        .with({ type: SimulationErrorType.Configuration }, (e) => [`Configuration error: ${e.detail}`])
        .with({ type: SimulationErrorType.Topology }, (e) => [
            `No convergence after ${e.roundsAttempted} rounds (last snapshot: round ${e.lastSnapshot.round})`,
        ])
        .exhaustive();
};
