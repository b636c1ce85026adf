import { Err, Ok, Result } from "oxide.ts";
import * as z from "zod";
import type { UniqueKey } from "@core/object";

/**
 * Opaque router label. Ids are ordered by the code units of their label so
 * every iteration over routers or destinations is reproducible.
 */
export class NodeId implements UniqueKey {
    #label: string;

    constructor(label: string) {
        if (label.length === 0) {
            throw new Error("NodeId: label must not be empty");
        }
        this.#label = label;
    }

    static fromString(label: string): Result<NodeId, void> {
        if (label.length === 0) {
            return Err(undefined);
        }
        return Ok(new NodeId(label));
    }

    static schema = z
        .union([z.string().trim().min(1), z.number().int().min(0)])
        .transform((value) => new NodeId(String(value)));

    static compare(a: NodeId, b: NodeId): number {
        if (a.#label === b.#label) {
            return 0;
        }
        return a.#label < b.#label ? -1 : 1;
    }

    static sorted(ids: Iterable<NodeId>): NodeId[] {
        return [...ids].sort(NodeId.compare);
    }

    label(): string {
        return this.#label;
    }

    equals(other: NodeId): boolean {
        return this.#label === other.#label;
    }

    lessThan(other: NodeId): boolean {
        return NodeId.compare(this, other) < 0;
    }

    uniqueKey(): string {
        return this.#label;
    }

    toString(): string {
        return `NodeId(${this.#label})`;
    }

    display(): string {
        return this.#label;
    }

    toJSON(): string {
        return this.display();
    }
}
