export interface CancelListening {
    (): void;
}

export class EventBroker<E> {
    #handlers = new Map<symbol, (ev: E) => void>();

    listen(handler: (ev: E) => void): CancelListening {
        const id = Symbol();
        this.#handlers.set(id, handler);
        return () => {
            this.#handlers.delete(id);
        };
    }

    emit(event: E): void {
        for (const handler of this.#handlers.values()) {
            handler(event);
        }
    }
}
