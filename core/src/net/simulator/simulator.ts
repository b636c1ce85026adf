import { Err, Ok, Result } from "oxide.ts";
import { ObjectMap } from "@core/object";
import { EventBroker, type CancelListening } from "@core/event";
import type { NodeId } from "../node";
import { Router, type DistanceVector } from "../routing";
import { Topology, type TopologyInput } from "../topology";
import {
    configurationError,
    fromZodIssues,
    topologyError,
    type ConfigurationError,
    type SimulationError,
} from "../error";
import { SimulationOptions, defaultMaxRounds } from "./options";
import type { RoundSnapshot, RouterTableSnapshot, SimulationResult } from "./snapshot";

/**
 * Drives synchronous distance-vector rounds over a fixed topology.
 *
 * Every round first captures each router's vector, then delivers the captured
 * vectors along every directed link. A router therefore never sees a table
 * that was modified during the same round, and the outcome does not depend
 * on delivery order.
 */
export class Simulator {
    #topology: Topology;
    #routers = new ObjectMap<NodeId, Router>();
    #maxRounds: number;
    #round = 0;
    #snapshots: RoundSnapshot[] = [];
    #convergedAt: number | undefined;
    #onRound = new EventBroker<RoundSnapshot>();

    private constructor(topology: Topology, maxRounds: number) {
        this.#topology = topology;
        this.#maxRounds = maxRounds;
        for (const id of topology.nodes()) {
            const router = new Router({ id, links: topology.neighbors(id), destinations: topology.nodes() });
            this.#routers.set(id, router);
        }
        this.#record();
    }

    static create(topology: Topology, options: SimulationOptions = {}): Result<Simulator, ConfigurationError> {
        const parsed = SimulationOptions.schema.safeParse(options);
        if (!parsed.success) {
            return Err(fromZodIssues(parsed.error.issues));
        }
        const maxRounds = parsed.data.maxRounds ?? defaultMaxRounds(topology.size);
        return Ok(new Simulator(topology, maxRounds));
    }

    get topology(): Topology {
        return this.#topology;
    }

    get maxRounds(): number {
        return this.#maxRounds;
    }

    currentRound(): number {
        return this.#round;
    }

    isConverged(): boolean {
        return this.#convergedAt !== undefined;
    }

    snapshots(): readonly RoundSnapshot[] {
        return [...this.#snapshots];
    }

    lastSnapshot(): RoundSnapshot {
        return this.#snapshots[this.#snapshots.length - 1];
    }

    tables(): readonly RouterTableSnapshot[] {
        return this.lastSnapshot().tables;
    }

    /**
     * Called with every snapshot recorded after registration.
     * The seeded round 0 is recorded on creation and is only available from {@link snapshots}.
     */
    onRound(listener: (snapshot: RoundSnapshot) => void): CancelListening {
        return this.#onRound.listen(listener);
    }

    /**
     * Runs exactly one round and records its snapshot. May be called after
     * convergence, in which case it reports no change.
     *
     * @returns whether any routing table changed during the round
     */
    step(): Result<boolean, ConfigurationError> {
        const vectors = new ObjectMap<NodeId, DistanceVector>();
        for (const [id, router] of this.#routers.entries()) {
            vectors.set(id, router.currentVector());
        }

        let changed = false;
        for (const receiverId of this.#topology.nodes()) {
            const receiver = this.#routers.get(receiverId);
            if (receiver === undefined) {
                return Err(configurationError(`no router for ${receiverId.display()}`));
            }

            for (const [senderId] of this.#topology.neighbors(receiverId)) {
                const vector = vectors.get(senderId);
                if (vector === undefined) {
                    return Err(configurationError(`no router for ${senderId.display()}`));
                }

                const result = receiver.receiveAndRelax(senderId, vector);
                if (result.isErr()) {
                    return Err(result.unwrapErr());
                }
                changed = result.unwrap() || changed;
            }
        }

        this.#round += 1;
        if (!changed && this.#convergedAt === undefined) {
            this.#convergedAt = this.#round;
            console.info(`[Simulator] converged at round ${this.#round}`);
        }
        this.#record();
        return Ok(changed);
    }

    run(): Result<SimulationResult, SimulationError> {
        while (!this.isConverged()) {
            if (this.#round >= this.#maxRounds) {
                console.warn(`[Simulator] no convergence within ${this.#maxRounds} rounds`);
                return Err(topologyError(this.#round, this.lastSnapshot()));
            }

            const result = this.step();
            if (result.isErr()) {
                return Err(result.unwrapErr());
            }
        }

        return Ok(this.#result());
    }

    #result(): SimulationResult {
        return Object.freeze({
            snapshots: this.snapshots(),
            convergedAt: this.#convergedAt ?? this.#round,
            finalTables: this.tables(),
        });
    }

    #record(): void {
        const tables = [...this.#routers.values()].map(
            (router): RouterTableSnapshot => Object.freeze({ nodeId: router.id, entries: router.table() }),
        );
        const snapshot: RoundSnapshot = Object.freeze({ round: this.#round, tables: Object.freeze(tables) });
        this.#snapshots.push(snapshot);
        this.#onRound.emit(snapshot);
    }
}

export const runSimulation = (
    input: Topology | TopologyInput,
    options: SimulationOptions = {},
): Result<SimulationResult, SimulationError> => {
    const topology: Result<Topology, ConfigurationError> = input instanceof Topology ? Ok(input) : Topology.parse(input);
    if (topology.isErr()) {
        return Err(topology.unwrapErr());
    }

    const simulator = Simulator.create(topology.unwrap(), options);
    if (simulator.isErr()) {
        return Err(simulator.unwrapErr());
    }

    return simulator.unwrap().run();
};
