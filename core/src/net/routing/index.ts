export { DistanceVector } from "./vector";
export { RoutingTable } from "./table";
export type { RoutingEntry } from "./table";
export { Router } from "./router";
