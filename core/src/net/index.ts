export * from "./node";
export * from "./topology";
export * from "./routing";
export * from "./simulator";
export { SimulationErrorType, configurationError, topologyError, fromZodIssues } from "./error";
export type { ConfigurationError, TopologyError, SimulationError } from "./error";
