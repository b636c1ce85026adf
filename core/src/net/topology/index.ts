export { Topology, TopologyBuilder } from "./topology";
export type { Link } from "./topology";
export { LinkDescription, TopologyDescription } from "./description";
export type { TopologyInput } from "./description";
export { shortestPaths } from "./shortestPath";
