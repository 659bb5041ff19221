/**
 * A resumable unit of work. resume() is called by whatever the continuation
 * waits for (a Query, a Timer, a Connection) and must run to completion
 * without blocking. It may be called more than once per logical event, so
 * implementations re-check the state of everything they own each time.
 */
export interface Continuation {
    resume(): void;
}

export function continuation(fn: () => void): Continuation {
    return { resume: fn };
}
