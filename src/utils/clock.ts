/**
 * Time source for every time-dependent component.
 * The scheduler, the price walk and the DTE math all read "now" through a Clock
 * so tests can drive them with virtual time.
 */
export interface Clock {
    now(): Date;
    /** Resolve after `ms`, or immediately once `signal` aborts. Never rejects. */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
    now: () => new Date(),
    sleep: (ms: number, signal?: AbortSignal): Promise<void> => {
        return new Promise(resolve => {
            if (signal?.aborted) {
                resolve();
                return;
            }
            const done = (): void => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', done);
                resolve();
            };
            const timer = setTimeout(done, ms);
            signal?.addEventListener('abort', done, { once: true });
        });
    },
};

/**
 * Virtual clock: sleep() advances time instantly.
 */
export class ManualClock implements Clock {
    private current: number;
    readonly sleeps: number[] = [];

    constructor(start: Date) {
        this.current = start.getTime();
    }

    now(): Date {
        return new Date(this.current);
    }

    async sleep(ms: number, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) return;
        this.sleeps.push(ms);
        this.current += ms;
    }

    advance(ms: number): void {
        this.current += ms;
    }

    set(date: Date): void {
        this.current = date.getTime();
    }
}
