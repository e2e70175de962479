import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, type HealthDeps } from './handlers/health.js';
import { handleListIncidents, handleReminderStats } from './handlers/incidents.js';
import { handleActionEvent, handleReportEvent, handleThreadMessageEvent } from './handlers/events.js';
import { requestLogger, requireSignature, sendError, setRawRequestBody } from './shared.js';
import type { IncidentInteractions } from '../services/incident-interactions.js';
import { logThought } from '../utils/logger.js';
import { readNumberConfig } from '../config/config-loader.js';

export interface ApiServerDeps extends HealthDeps {
    interactions: IncidentInteractions;
}

const DEFAULT_PORT = 3100;

/**
 * Build the HTTP API.
 *
 * Endpoints:
 *   GET  /health                 Store reachability, reminder stats, worker job status
 *   GET  /incidents              Incidents with pending reminders, `?scope=active|all` (signed)
 *   GET  /reminders/stats        Reminder counts and next due time (signed)
 *   POST /events/report          New report in a watched channel (signed)
 *   POST /events/action          Button click on incident controls (signed)
 *   POST /events/thread-message  Reply inside an incident thread (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(deps));

    app.get('/incidents', requireSignature, handleListIncidents(deps));
    app.get('/reminders/stats', requireSignature, handleReminderStats(deps));

    app.post('/events/report', requireSignature, handleReportEvent(deps));
    app.post('/events/action', requireSignature, handleActionEvent(deps));
    app.post('/events/thread-message', requireSignature, handleThreadMessageEvent(deps));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Create the API and start listening; resolves once the port is bound. */
export function startApiServer(deps: ApiServerDeps, port = readNumberConfig('API_PORT', DEFAULT_PORT)): Promise<Server> {
    const server = createServer(createApiApp(deps));

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            console.log(`[Threadwatch API] Listening on http://localhost:${port}`);
            void logThought(`[API] HTTP server started on port ${port}.`);
            resolve(server);
        });
    });
}
