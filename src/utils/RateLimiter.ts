// src/utils/RateLimiter.ts
// Single shared limiter for every external model call (embeddings and completions)

import { Clock, systemClock } from './clock';

export interface RateLimiterOptions {
    minIntervalMs: number;         // minimum gap between two call starts
    maxRequestsPerWindow?: number; // 0 or undefined = no window limit
    windowMs?: number;
    clock?: Clock;
}

/**
 * RateLimiter - reservation-based limiter shared across concurrent runs
 *
 * A slot is reserved synchronously before the first await, so two callers
 * racing on the event loop can never claim the same slot.
 */
export class RateLimiter {
    private readonly minIntervalMs: number;
    private readonly maxRequestsPerWindow: number;
    private readonly windowMs: number;
    private readonly clock: Clock;

    private nextFreeAt = 0;
    private reservations: number[] = [];
    private granted = 0;

    constructor(options: RateLimiterOptions) {
        this.minIntervalMs = Math.max(0, options.minIntervalMs);
        this.maxRequestsPerWindow = Math.max(0, options.maxRequestsPerWindow ?? 0);
        this.windowMs = Math.max(0, options.windowMs ?? 60000);
        this.clock = options.clock ?? systemClock;
    }

    /**
     * Reserve the next slot and return its start time
     */
    reserve(): number {
        const now = this.clock.now();
        let at = Math.max(now, this.nextFreeAt);

        if (this.maxRequestsPerWindow > 0) {
            this.reservations = this.reservations.filter(t => t > at - this.windowMs);
            if (this.reservations.length >= this.maxRequestsPerWindow) {
                const blocking = this.reservations[this.reservations.length - this.maxRequestsPerWindow];
                at = Math.max(at, blocking + this.windowMs);
            }
            this.reservations.push(at);
        }

        this.nextFreeAt = at + this.minIntervalMs;
        this.granted++;
        return at;
    }

    /**
     * Wait until a slot is available
     */
    async acquire(): Promise<void> {
        const at = this.reserve();
        const wait = at - this.clock.now();
        if (wait > 0) {
            await this.clock.sleep(wait);
        }
    }

    /**
     * Run `task` in the next available slot
     */
    async schedule<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        return task();
    }

    get grantedCount(): number {
        return this.granted;
    }
}

export const unlimited = (clock?: Clock): RateLimiter => new RateLimiter({ minIntervalMs: 0, clock });
