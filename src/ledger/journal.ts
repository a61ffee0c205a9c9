/**
 * Undo journal for all-or-nothing operations
 *
 * While an `atomically()` scope is open, every mutation of a balance cell, order
 * or tick registers its inverse here. If the scope throws, inverses run newest
 * first, so each one sees exactly the state its mutation produced.
 */

type Compensation = () => void;

class Journal {
    private readonly compensations: Compensation[] = [];

    record(compensation: Compensation): void {
        this.compensations.push(compensation);
    }

    rollback(): void {
        while (this.compensations.length > 0) {
            const compensation = this.compensations.pop();
            compensation?.();
        }
    }
}

let active: Journal | null = null;

/**
 * Run `operation` as one unit. Nested calls join the outermost scope.
 */
export function atomically<T>(operation: () => T): T {
    if (active) {
        return operation();
    }

    const journal = new Journal();
    active = journal;
    try {
        return operation();
    } catch (error) {
        journal.rollback();
        throw error;
    } finally {
        active = null;
    }
}

/**
 * Register the inverse of a mutation that just happened.
 * No-op outside an `atomically()` scope.
 */
export function recordUndo(compensation: Compensation): void {
    active?.record(compensation);
}
