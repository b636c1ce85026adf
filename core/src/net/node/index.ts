export { NodeId } from "./nodeId";
export { Cost } from "./cost";
