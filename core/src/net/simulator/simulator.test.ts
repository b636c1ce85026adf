import { NodeId } from "../node";
import { SimulationErrorType } from "../error";
import { Topology, TopologyBuilder, type TopologyInput } from "../topology";
import { Simulator, runSimulation } from "./simulator";
import { entryOf, tableOf, type RouterTableSnapshot } from "./snapshot";
import { verifyTables } from "./verify";

const id = (label: string) => new NodeId(label);

const rows = (tables: readonly RouterTableSnapshot[]) =>
    tables.map((table) => [
        table.nodeId.label(),
        table.entries.map(({ destination, cost, nextHop }) => {
            return `${destination.label()}:${cost.display()}:${nextHop?.label() ?? "-"}`;
        }),
    ]);

const triangle: TopologyInput = {
    links: [
        { source: "A", destination: "B", cost: 1 },
        { source: "B", destination: "C", cost: 1 },
        { source: "A", destination: "C", cost: 5 },
    ],
};

const demoNetwork = () =>
    new TopologyBuilder()
        .addLink("A", "B", 1)
        .addLink("A", "F", 3)
        .addLink("B", "C", 3)
        .addLink("B", "F", 1)
        .addLink("B", "E", 5)
        .addLink("C", "D", 2)
        .addLink("D", "E", 1)
        .addLink("E", "F", 2)
        .addLink("D", "F", 6)
        .build()
        .unwrap();

const line = (length: number) => {
    const builder = new TopologyBuilder();
    for (let i = 1; i < length; i++) {
        builder.addLink(`N${i}`, `N${i + 1}`, 1);
    }
    return builder.build().unwrap();
};

const grid = () => {
    const builder = new TopologyBuilder();
    const name = (row: number, column: number) => `R${row}${column}`;
    for (let row = 0; row < 3; row++) {
        for (let column = 0; column < 3; column++) {
            if (column < 2) {
                builder.addLink(name(row, column), name(row, column + 1), ((row + 2 * column) % 4) + 0.5);
            }
            if (row < 2) {
                builder.addLink(name(row, column), name(row + 1, column), ((3 * row + column) % 5) + 0.25);
            }
        }
    }
    return builder.build().unwrap();
};

describe("Simulator", () => {
    beforeEach(() => {
        vi.spyOn(console, "info").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("triangle A-B 1, B-C 1, A-C 5", () => {
        it("converges to shortest paths within 2 rounds", () => {
            const result = runSimulation(triangle).unwrap();

            expect(result.convergedAt).toBe(2);
            expect(rows(result.finalTables)).toStrictEqual([
                ["A", ["A:0:A", "B:1:B", "C:2:B"]],
                ["B", ["A:1:A", "B:0:B", "C:1:C"]],
                ["C", ["A:2:B", "B:1:B", "C:0:C"]],
            ]);
        });

        it("records the seeded state and every round", () => {
            const { snapshots } = runSimulation(triangle).unwrap();

            expect(snapshots.map((snapshot) => snapshot.round)).toStrictEqual([0, 1, 2]);
            expect(rows(snapshots[0].tables)).toStrictEqual([
                ["A", ["A:0:A", "B:1:B", "C:5:C"]],
                ["B", ["A:1:A", "B:0:B", "C:1:C"]],
                ["C", ["A:5:A", "B:1:B", "C:0:C"]],
            ]);
            expect(rows(snapshots[1].tables)).toStrictEqual(rows(snapshots[2].tables));
        });

        it("logs convergence", () => {
            runSimulation(triangle).unwrap();
            expect(console.info).toHaveBeenCalledWith("[Simulator] converged at round 2");
        });
    });

    it("reaches the centralized shortest paths on the demo network", () => {
        const topology = demoNetwork();
        const result = runSimulation(topology).unwrap();

        expect(result.convergedAt).toBe(4);
        expect(verifyTables(topology, result.finalTables)).toStrictEqual([]);
        expect(rows(result.finalTables)).toStrictEqual([
            ["A", ["A:0:A", "B:1:B", "C:4:B", "D:5:B", "E:4:B", "F:2:B"]],
            ["B", ["A:1:A", "B:0:B", "C:3:C", "D:4:F", "E:3:F", "F:1:F"]],
            ["C", ["A:4:B", "B:3:B", "C:0:C", "D:2:D", "E:3:D", "F:4:B"]],
            ["D", ["A:5:E", "B:4:E", "C:2:C", "D:0:D", "E:1:E", "F:3:E"]],
            ["E", ["A:4:F", "B:3:F", "C:3:D", "D:1:D", "E:0:E", "F:2:F"]],
            ["F", ["A:2:B", "B:1:B", "C:4:B", "D:3:E", "E:2:E", "F:0:F"]],
        ]);

        const a = result.finalTables[0];
        expect(entryOf(a, id("D"))?.nextHop?.label()).toBe("B");
    });

    it.each([
        { name: "a line of 6 routers", build: () => line(6) },
        { name: "a 3x3 grid with fractional costs", build: grid },
        { name: "a single router", build: () => new TopologyBuilder().addRouter("solo").build().unwrap() },
    ])("agrees with the reference on $name", ({ build }) => {
        const topology = build();
        const result = runSimulation(topology).unwrap();
        expect(verifyTables(topology, result.finalTables)).toStrictEqual([]);
        expect(result.finalTables.flatMap((table) => table.entries).every((entry) => entry.cost.isFinite())).toBe(
            true,
        );
    });

    it("never increases a cost between rounds", () => {
        const { snapshots } = runSimulation(grid()).unwrap();

        for (let round = 1; round < snapshots.length; round++) {
            const previous = snapshots[round - 1].tables;
            snapshots[round].tables.forEach((table, i) => {
                table.entries.forEach((entry, j) => {
                    expect(entry.cost.get()).toBeGreaterThanOrEqual(0);
                    expect(entry.cost.get()).toBeLessThanOrEqual(previous[i].entries[j].cost.get());
                });
            });
        }
    });

    it("reports no change for a round after convergence", () => {
        const simulator = Simulator.create(demoNetwork()).unwrap();
        simulator.run().unwrap();
        const converged = simulator.tables();

        expect(simulator.step().unwrap()).toBe(false);
        expect(simulator.isConverged()).toBe(true);
        expect(JSON.stringify(simulator.tables())).toBe(JSON.stringify(converged));
    });

    it("produces identical snapshots across runs and link orderings", () => {
        const first = runSimulation(demoNetwork()).unwrap();
        const second = runSimulation(demoNetwork()).unwrap();
        const reversed = runSimulation(
            Topology.fromDescription({ routers: [], links: [...demoNetwork().links()].reverse() }).unwrap(),
        ).unwrap();

        expect(JSON.stringify(second.snapshots)).toBe(JSON.stringify(first.snapshots));
        expect(JSON.stringify(reversed.snapshots)).toBe(JSON.stringify(first.snapshots));
    });

    it("uses nodeCount - 1 as the default round bound", () => {
        const simulator = Simulator.create(line(4)).unwrap();
        expect(simulator.maxRounds).toBe(3);
        expect(simulator.run().unwrap().convergedAt).toBe(3);
    });

    it("fails with TopologyError when the round bound is exhausted", () => {
        const simulator = Simulator.create(line(4), { maxRounds: 1 }).unwrap();
        const error = simulator.run().unwrapErr();

        if (error.type !== SimulationErrorType.Topology) {
            throw new Error(`unexpected error: ${error.type}`);
        }
        expect(error.roundsAttempted).toBe(1);
        expect(error.lastSnapshot.round).toBe(1);

        const n1 = tableOf(error.lastSnapshot, id("N1"));
        expect(n1 && rows([n1])).toStrictEqual([["N1", ["N1:0:N1", "N2:1:N2", "N3:2:N2", "N4:inf:-"]]]);
        expect(console.warn).toHaveBeenCalledWith("[Simulator] no convergence within 1 rounds");
    });

    it("rejects invalid options", () => {
        const result = Simulator.create(line(3), { maxRounds: 0 });
        expect(result.unwrapErr()).toStrictEqual({
            type: SimulationErrorType.Configuration,
            detail: "maxRounds: Number must be greater than 0",
        });
    });

    it("rejects invalid topologies before any round runs", () => {
        const result = runSimulation({ links: [{ source: "A", destination: "B", cost: 0 }] });
        expect(result.unwrapErr()).toStrictEqual({
            type: SimulationErrorType.Configuration,
            detail: "links.0.cost: link cost must be greater than 0",
        });
    });

    it("notifies round listeners until cancelled", () => {
        const simulator = Simulator.create(Topology.parse(triangle).unwrap()).unwrap();
        const rounds: number[] = [];
        const cancel = simulator.onRound((snapshot) => rounds.push(snapshot.round));

        simulator.run().unwrap();
        cancel();
        simulator.step().unwrap();

        expect(rounds).toStrictEqual([1, 2]);
        expect(simulator.currentRound()).toBe(3);
        expect(simulator.snapshots()).toHaveLength(4);
    });

    it("exposes frozen snapshots", () => {
        const { snapshots } = runSimulation(triangle).unwrap();
        expect(Object.isFrozen(snapshots[0])).toBe(true);
        expect(Object.isFrozen(snapshots[0].tables)).toBe(true);
        expect(Object.isFrozen(snapshots[0].tables[0].entries)).toBe(true);
    });
});

describe("verifyTables", () => {
    beforeEach(() => {
        vi.spyOn(console, "info").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("accepts converged tables whose costs are not exact in binary", () => {
        const topology = new TopologyBuilder()
            .addLink("A", "B", 0.1)
            .addLink("B", "C", 0.2)
            .addLink("C", "D", 0.3)
            .build()
            .unwrap();
        const { finalTables } = runSimulation(topology).unwrap();

        expect(verifyTables(topology, finalTables)).toStrictEqual([]);
        expect(entryOf(finalTables[0], id("D"))?.cost.get()).toBe(0.1 + (0.2 + 0.3));
        expect(entryOf(finalTables[3], id("A"))?.cost.get()).toBe(0.3 + (0.2 + 0.1));
    });

    it("reports entries that differ from the reference", () => {
        const topology = Topology.parse(triangle).unwrap();
        const seeded = Simulator.create(topology).unwrap().tables();

        const mismatches = verifyTables(topology, seeded);
        expect(
            mismatches.map(({ router, destination, expected, actual }) => [
                router.label(),
                destination.label(),
                expected.get(),
                actual?.get(),
            ]),
        ).toStrictEqual([
            ["A", "C", 2, 5],
            ["C", "A", 2, 5],
        ]);
    });
});
