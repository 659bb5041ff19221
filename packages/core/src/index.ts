export * from "./config.js";
export * from "./core.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./database/database.js";
export * from "./database/helper-row-creator.js";
export * from "./database/query.js";
export * from "./database/transaction.js";
export * from "./fetch/decoders.js";
export * from "./fetch/fetcher.js";
export * from "./mailbox/mailbox.js";
export * from "./mailbox/session.js";
export * from "./message/message.js";
export * from "./message/message-set.js";
export * from "./message/name-registry.js";
export * from "./message/selector.js";
export * from "./monitor/gauges.js";
export * from "./reactor/connection.js";
export * from "./reactor/continuation.js";
export * from "./reactor/listener.js";
export * from "./reactor/poller.js";
export * from "./reactor/reactor.js";
export * from "./reactor/reclamation.js";
export * from "./reactor/socket.js";
export * from "./reactor/stream.js";
export * from "./reactor/timer.js";
export * from "./transports/http.js";
