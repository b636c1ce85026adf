export class Duration {
    #ms: number;

    private constructor(ms: number) {
        this.#ms = ms;
    }

    get millies(): number {
        return this.#ms;
    }

    static fromMillies(ms: number): Duration {
        return new Duration(ms);
    }

    isZero(): boolean {
        return this.#ms === 0;
    }
}
