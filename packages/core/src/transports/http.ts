import type { Server } from "node:http";
import express, { type Express, type Request, type Response } from "express";
import { Logger } from "../logger.js";
import type { GaugeRegistry } from "../monitor/gauges.js";

/** What the status endpoint reports on. */
export interface StatusSource {
    gauges: GaugeRegistry;
    connectionCount(): number;
    inShutdown(): boolean;
}

export interface HealthReport {
    status: "ok" | "stopping";
    connections: number;
    timestamp: string;
}

export function healthReport(source: StatusSource, now: Date = new Date()): HealthReport {
    return {
        status: source.inShutdown() ? "stopping" : "ok",
        connections: source.connectionCount(),
        timestamp: now.toISOString(),
    };
}

export function gaugeReport(source: StatusSource): Record<string, number> {
    return source.gauges.snapshot();
}

export function createStatusApp(source: StatusSource): Express {
    const app = express();

    app.get("/health", (_req: Request, res: Response) => {
        const report = healthReport(source);
        res.status(report.status === "ok" ? 200 : 503).json(report);
    });

    app.get("/gauges", (_req: Request, res: Response) => {
        res.json(gaugeReport(source));
    });

    return app;
}

/**
 * Serves the health and gauge endpoints on a plain HTTP port. This runs
 * beside the Reactor on Node's own event loop; it never touches a
 * Connection.
 */
export function setupStatusTransport(source: StatusSource, port: number, host = "127.0.0.1"): Promise<Server> {
    const app = createStatusApp(source);
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host, () => {
            Logger.info(`Status endpoint running on http://${host}:${port}`, { facility: "status" });
            Logger.info(`Health check: http://${host}:${port}/health`, { facility: "status" });
            resolve(server);
        });
        server.once("error", reject);
    });
}
