import * as z from "zod";

export const SimulationOptions = {
    schema: z.object({
        maxRounds: z.number().int().positive().optional(),
    }),
};
export type SimulationOptions = z.infer<typeof SimulationOptions.schema>;

// Shortest paths in a connected graph have at most `nodeCount - 1` hops.
export const defaultMaxRounds = (nodeCount: number): number => Math.max(1, nodeCount - 1);
