import { fileURLToPath } from "node:url";
import { Err, Ok, Result } from "oxide.ts";
import { match } from "ts-pattern";
import * as z from "zod";
import { Duration } from "@core/time";
import { configurationError, fromZodIssues, type ConfigurationError } from "@core/net";

export const DEFAULT_TOPOLOGY_PATH = fileURLToPath(new URL("../topologies/example.json", import.meta.url));

export const CliConfig = {
    schema: z.object({
        topologyPath: z.string().min(1).default(DEFAULT_TOPOLOGY_PATH),
        maxRounds: z.coerce.number().int().positive().optional(),
        interval: z.coerce
            .number()
            .int()
            .min(0)
            .default(0)
            .transform((ms) => Duration.fromMillies(ms)),
    }),
};
export type CliConfig = z.infer<typeof CliConfig.schema>;

export const USAGE = "usage: dv-sim [topology.json] [--max-rounds <n>] [--interval <ms>]";

type RawConfig = { topologyPath?: string; maxRounds?: string; interval?: string };

export const parseArgs = (args: readonly string[]): Result<CliConfig, ConfigurationError> => {
    const raw: RawConfig = {};
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (!arg.startsWith("--")) {
            if (raw.topologyPath !== undefined) {
                return Err(configurationError(`unexpected argument ${arg}`));
            }
            raw.topologyPath = arg;
            continue;
        }

        const key = match(arg)
            .with("--max-rounds", () => "maxRounds" as const)
            .with("--interval", () => "interval" as const)
            .otherwise(() => undefined);
        if (key === undefined) {
            return Err(configurationError(`unknown option ${arg}`));
        }

        const value = args[i + 1];
        if (value === undefined || value.startsWith("--")) {
            return Err(configurationError(`option ${arg} requires a value`));
        }
        raw[key] = value;
        i++;
    }

    const parsed = CliConfig.schema.safeParse(raw);
    if (!parsed.success) {
        return Err(fromZodIssues(parsed.error.issues));
    }
    return Ok(parsed.data);
};
