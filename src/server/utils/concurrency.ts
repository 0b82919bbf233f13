/**
 * Counting admission gate for async work.
 *
 * At most `concurrency` thunks run at once; the rest wait in FIFO order.
 */
export class AdmissionGate {
    private readonly queue: (() => void)[] = [];
    private active = 0;

    constructor(readonly concurrency: number) {
        if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
            throw new TypeError('Expected `concurrency` to be a number from 1 and up');
        }
    }

    get activeCount(): number {
        return this.active;
    }

    get pendingCount(): number {
        return this.queue.length;
    }

    run<T>(fn: () => Promise<T>): Promise<T> {
        const execute = async (): Promise<T> => {
            this.active++;
            try {
                return await fn();
            } finally {
                this.next();
            }
        };

        if (this.active < this.concurrency) {
            return execute();
        }
        return new Promise<T>((resolve, reject) => {
            this.queue.push(() => {
                execute().then(resolve, reject);
            });
        });
    }

    private next(): void {
        this.active--;
        const nextFn = this.queue.shift();
        if (nextFn) {
            nextFn();
        }
    }
}
