/**
 * Trailing debounce over a single timer handle.
 *
 * Each `schedule` replaces the pending call, so at most one is ever waiting
 * and it runs `delayMs` after the latest `schedule`.
 */
export class Debouncer {
    private timeoutId: ReturnType<typeof setTimeout> | null = null;

    constructor(private readonly delayMs: number) {}

    get isPending(): boolean {
        return this.timeoutId !== null;
    }

    schedule(fn: () => void): void {
        this.cancel();
        this.timeoutId = setTimeout(() => {
            this.timeoutId = null;
            fn();
        }, this.delayMs);
    }

    cancel(): void {
        if (this.timeoutId !== null) {
            clearTimeout(this.timeoutId);
            this.timeoutId = null;
        }
    }
}
