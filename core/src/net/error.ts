import type { ZodIssue } from "zod";
import type { RoundSnapshot } from "./simulator/snapshot";

export const SimulationErrorType = {
    Configuration: "ConfigurationError",
    Topology: "TopologyError",
} as const;
export type SimulationErrorType = (typeof SimulationErrorType)[keyof typeof SimulationErrorType];

// Invalid input, or an exchange that does not follow the link topology.
export type ConfigurationError = { type: typeof SimulationErrorType.Configuration; detail: string };

// The round bound was exhausted while tables were still changing.
export type TopologyError = {
    type: typeof SimulationErrorType.Topology;
    roundsAttempted: number;
    lastSnapshot: RoundSnapshot;
};

export type SimulationError = ConfigurationError | TopologyError;

export const configurationError = (detail: string): ConfigurationError => {
    return { type: SimulationErrorType.Configuration, detail };
};

export const topologyError = (roundsAttempted: number, lastSnapshot: RoundSnapshot): TopologyError => {
    return { type: SimulationErrorType.Topology, roundsAttempted, lastSnapshot };
};

export const fromZodIssues = (issues: readonly ZodIssue[]): ConfigurationError => {
    const detail = issues
        .map((issue) => (issue.path.length === 0 ? issue.message : `${issue.path.join(".")}: ${issue.message}`))
        .join("; ");
    return configurationError(detail);
};
