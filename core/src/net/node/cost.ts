import { Err, Ok, Result } from "oxide.ts";
import * as z from "zod";

/**
 * Path or link cost. Non-negative and possibly infinite; infinity marks a
 * destination with no known path and absorbs any addition.
 */
export class Cost {
    #cost: number;

    constructor(cost: number) {
        if (Number.isNaN(cost) || cost < 0) {
            throw new Error(`Cost must be a non-negative number, but was ${cost}`);
        }
        this.#cost = cost;
    }

    static zero(): Cost {
        return new Cost(0);
    }

    static infinity(): Cost {
        return new Cost(Number.POSITIVE_INFINITY);
    }

    static fromNumber(cost: number): Result<Cost, void> {
        if (Number.isNaN(cost) || cost < 0) {
            return Err(undefined);
        }
        return Ok(new Cost(cost));
    }

    // Costs a link may carry: finite and strictly positive.
    static linkSchema = z
        .union([z.number(), z.string().min(1)])
        .pipe(
            z.coerce
                .number()
                .finite()
                .gt(0, { message: "link cost must be greater than 0" }),
        )
        .transform((value) => new Cost(value));

    get(): number {
        return this.#cost;
    }

    isFinite(): boolean {
        return Number.isFinite(this.#cost);
    }

    isInfinite(): boolean {
        return !this.isFinite();
    }

    equals(other: Cost): boolean {
        return this.#cost === other.#cost;
    }

    add(other: Cost): Cost {
        return new Cost(this.#cost + other.#cost);
    }

    lessThan(other: Cost): boolean {
        return this.#cost < other.#cost;
    }

    toString(): string {
        return `Cost(${this.display()})`;
    }

    display(): string {
        return this.isFinite() ? `${this.#cost}` : "inf";
    }

    toJSON(): number | null {
        return this.isFinite() ? this.#cost : null;
    }
}
