import { readFile } from "node:fs/promises";
import { Err, Result } from "oxide.ts";
import { Topology, configurationError, type ConfigurationError } from "@core/net";

export const loadTopology = async (path: string): Promise<Result<Topology, ConfigurationError>> => {
    let text: string;
    try {
        text = await readFile(path, "utf8");
    } catch (error) {
        return Err(configurationError(`cannot read ${path}: ${error instanceof Error ? error.message : error}`));
    }

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        return Err(configurationError(`${path} is not valid JSON: ${error instanceof Error ? error.message : error}`));
    }

    return Topology.parse(json);
};
