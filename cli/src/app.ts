import { sleep } from "@core/async";
import { Simulator, verifyTables, type SimulationResult, type Topology } from "@core/net";
import { USAGE, parseArgs } from "./config";
import { loadTopology } from "./topologyFile";
import { formatError, formatLinks, formatMismatches, formatResult, formatRound } from "./reporter";

export interface Output {
    log(line: string): void;
    error(line: string): void;
}

const print = (output: Output, channel: keyof Output, lines: readonly string[]) => {
    for (const line of lines) {
        output[channel](line);
    }
};

/**
 * Prints the outcome of a converged run and checks it against the centralized shortest paths.
 *
 * @returns the process exit code, non-zero when any entry disagrees with the reference
 */
export const report = (output: Output, topology: Topology, result: SimulationResult): number => {
    print(output, "log", formatResult(result));
    const mismatches = verifyTables(topology, result.finalTables);
    print(output, mismatches.length === 0 ? "log" : "error", formatMismatches(mismatches));
    return mismatches.length === 0 ? 0 : 1;
};

/**
 * Loads a topology, runs the simulation and prints every recorded round,
 * including the rounds before a failed convergence.
 *
 * @returns the process exit code
 */
export const run = async (args: readonly string[], output: Output = console): Promise<number> => {
    const config = parseArgs(args);
    if (config.isErr()) {
        print(output, "error", [...formatError(config.unwrapErr()), USAGE]);
        return 1;
    }
    const { topologyPath, maxRounds, interval } = config.unwrap();

    const topology = await loadTopology(topologyPath);
    if (topology.isErr()) {
        print(output, "error", formatError(topology.unwrapErr()));
        return 1;
    }

    const created = Simulator.create(topology.unwrap(), { maxRounds });
    if (created.isErr()) {
        print(output, "error", formatError(created.unwrapErr()));
        return 1;
    }
    const simulator = created.unwrap();

    print(output, "log", [...formatLinks(simulator.topology), ""]);

    const outcome = simulator.run();
    for (const snapshot of simulator.snapshots()) {
        print(output, "log", [...formatRound(snapshot), ""]);
        if (!interval.isZero()) {
            await sleep(interval);
        }
    }

    if (outcome.isErr()) {
        print(output, "error", formatError(outcome.unwrapErr()));
        return 1;
    }
    return report(output, simulator.topology, outcome.unwrap());
};
