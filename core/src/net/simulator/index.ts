export { Simulator, runSimulation } from "./simulator";
export { SimulationOptions, defaultMaxRounds } from "./options";
export type { RoundSnapshot, RouterTableSnapshot, SimulationResult } from "./snapshot";
export { tableOf, entryOf } from "./snapshot";
export { verifyTables } from "./verify";
export type { Mismatch } from "./verify";
