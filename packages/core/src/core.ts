import type { Server } from "node:http";
import type { QueryExecutor } from "@mailstore/shared/executor/interface.js";
import { PostgresExecutor } from "@mailstore/shared/executor/postgres.js";
import type { CoreConfig } from "./config.js";
import { Database } from "./database/database.js";
import type { FetchContext } from "./fetch/fetcher.js";
import { Logger, describeError } from "./logger.js";
import { Mailbox } from "./mailbox/mailbox.js";
import { createNameRegistries, type NameRegistries } from "./message/name-registry.js";
import { GaugePusher, GaugeRegistry, logGaugeSink, type GaugeSink } from "./monitor/gauges.js";
import { continuation } from "./reactor/continuation.js";
import { NodeReadinessPoller, type ReadinessPoller } from "./reactor/poller.js";
import { Reactor } from "./reactor/reactor.js";
import { DefaultReclamationPolicy } from "./reactor/reclamation.js";
import { setupStatusTransport } from "./transports/http.js";

export interface CoreDependencies {
    executor?: QueryExecutor;
    poller?: ReadinessPoller;
    clock?: () => number;
    gaugeSink?: GaugeSink;
    memoryUsage?: () => number;
}

export interface MailstoreCore {
    readonly config: CoreConfig;
    readonly reactor: Reactor;
    readonly db: Database;
    readonly registries: NameRegistries;
    readonly gauges: GaugeRegistry;
    readonly fetchContext: FetchContext;
    /** Returns the Mailbox with this id, creating it on first use. */
    mailbox(id: number, name: string): Mailbox;
    /** True once the name registries have been loaded. */
    ready(): boolean;
    /** Runs the Reactor until stop(), then releases the database. */
    start(): Promise<void>;
    stop(): void;
}

/**
 * Wires the Reactor, the database, the name registries and gauge pushing
 * together. Nothing runs until start().
 */
export function createMailstoreCore(config: CoreConfig, deps: CoreDependencies = {}): MailstoreCore {
    Logger.setLevel(config.logLevel);

    const clock = deps.clock ?? Date.now;
    const gauges = new GaugeRegistry();
    const reactor = new Reactor({
        poller: deps.poller ?? new NodeReadinessPoller(),
        clock,
        config: config.reactor,
        reclamation: new DefaultReclamationPolicy(config.reclamation, undefined, clock()),
        gauges,
        memoryUsage: deps.memoryUsage,
    });
    const db = new Database(deps.executor ?? new PostgresExecutor(config.database));
    const registries = createNameRegistries();
    const fetchContext: FetchContext = { db, registries, config: config.fetcher, clock };
    const mailboxes = new Map<number, Mailbox>();
    let loaded = false;

    const loadRegistries = (): void => {
        reactor.setStartup(true);
        const all = [registries.flags, registries.fieldNames, registries.annotationNames];
        const queries = all.map(registry => registry.reload(db, continuation(() => {
            if (loaded || !queries.every(q => q.done())) return;
            loaded = true;
            const failed = queries.filter(q => q.failed());
            if (failed.length > 0) {
                Logger.error(`Could not load ${failed.length} name tables`, { facility: "startup" });
            }
            Logger.info("Name tables loaded", {
                facility: "startup",
                flags: registries.flags.size(),
                fieldNames: registries.fieldNames.size(),
                annotationNames: registries.annotationNames.size(),
            });
            reactor.setStartup(false);
        })));
    };

    return {
        config,
        reactor,
        db,
        registries,
        gauges,
        fetchContext,

        mailbox(id: number, name: string): Mailbox {
            let m = mailboxes.get(id);
            if (!m) {
                m = new Mailbox(fetchContext, id, name);
                mailboxes.set(id, m);
            }
            return m;
        },

        ready(): boolean {
            return loaded;
        },

        async start(): Promise<void> {
            const pusher = new GaugePusher(reactor, gauges, deps.gaugeSink ?? logGaugeSink, config.gaugeIntervalMs);
            loadRegistries();

            let status: Server | undefined;
            if (config.statusPort !== undefined) {
                status = await setupStatusTransport({
                    gauges,
                    connectionCount: () => reactor.connections().length,
                    inShutdown: () => reactor.inShutdown(),
                }, config.statusPort);
            }

            try {
                await reactor.start();
            } finally {
                pusher.stop();
                if (status) {
                    const server = status;
                    await new Promise<void>((resolve) => {
                        server.close((error) => {
                            if (error) {
                                Logger.warn(`Status endpoint did not close cleanly: ${describeError(error)}`, {
                                    facility: "status",
                                });
                            }
                            resolve();
                        });
                    });
                }
                await db.disconnect();
            }
        },

        stop(): void {
            reactor.stop();
        },
    };
}
