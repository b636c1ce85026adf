import * as z from "zod";
import { Cost, NodeId } from "../node";

export const LinkDescription = {
    schema: z.object({
        source: NodeId.schema,
        destination: NodeId.schema,
        cost: Cost.linkSchema,
    }),
};
export type LinkDescription = z.infer<typeof LinkDescription.schema>;

export const TopologyDescription = {
    schema: z.object({
        routers: z.array(NodeId.schema).default([]),
        links: z.array(LinkDescription.schema),
    }),
};
export type TopologyDescription = z.infer<typeof TopologyDescription.schema>;
export type TopologyInput = z.input<typeof TopologyDescription.schema>;
