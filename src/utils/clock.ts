// src/utils/clock.ts
// Time source injected into retry, rate limiting and stage delays

export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, Math.max(0, ms)))
};

/**
 * Clock that never waits. Every sleep advances virtual time immediately
 * and is recorded so delays can be asserted without real timers.
 */
export class VirtualClock implements Clock {
    private current: number;
    readonly sleeps: number[] = [];

    constructor(start = 0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    async sleep(ms: number): Promise<void> {
        const duration = Math.max(0, ms);
        this.sleeps.push(duration);
        this.current += duration;
    }

    advance(ms: number): void {
        this.current += ms;
    }

    get totalSlept(): number {
        return this.sleeps.reduce((sum, ms) => sum + ms, 0);
    }
}
