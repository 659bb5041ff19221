export class MailstoreError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly cause?: unknown,
    ) {
        super(message);
        this.name = "MailstoreError";
    }
}

export type WaitErrorCode = "EINTR" | "EBADF" | "WAIT_FAILED";

/** Raised by a ReadinessPoller when waiting for readiness did not work out. */
export class WaitError extends MailstoreError {
    constructor(message: string, code: WaitErrorCode, cause?: unknown) {
        super(message, code, cause);
        this.name = "WaitError";
    }

    get waitCode(): WaitErrorCode {
        return this.code === "EINTR" || this.code === "EBADF" ? this.code : "WAIT_FAILED";
    }
}

export class ReactorError extends MailstoreError {
    constructor(message: string, cause?: unknown) {
        super(message, "REACTOR_ERROR", cause);
        this.name = "ReactorError";
    }
}

export class ConnectionError extends MailstoreError {
    constructor(message: string, cause?: unknown) {
        super(message, "CONNECTION_ERROR", cause);
        this.name = "ConnectionError";
    }
}

export class QueryError extends MailstoreError {
    constructor(message: string, cause?: unknown) {
        super(message, "QUERY_ERROR", cause);
        this.name = "QueryError";
    }
}

export class TransactionError extends MailstoreError {
    constructor(message: string, cause?: unknown) {
        super(message, "TRANSACTION_ERROR", cause);
        this.name = "TransactionError";
    }
}

export class ConfigError extends MailstoreError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message, "CONFIG_ERROR");
        this.name = "ConfigError";
    }
}

export class FetchError extends MailstoreError {
    constructor(message: string) {
        super(message, "FETCH_ERROR");
        this.name = "FetchError";
    }
}
