import express from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import http from 'http';
import { z } from 'zod';
import { saveConfig } from '../config';
import type { Config } from '../config';
import type { ClusterEvent } from '../cluster/types';
import { CLUSTER_COMMAND_HELP } from '../monitor/SpotMonitor';
import type { SpotMonitor, SpotView } from '../monitor/SpotMonitor';
import type { SpotFilterOptions } from '../spots/SpotFilter';
import type { ClassifiedSpot } from '../spots/types';
import { describeError } from '../util/abort';

export const SpotFilterSchema = z.object({
    bands: z.array(z.string()).optional(),
    grid: z.string().optional(),
    entityPrefix: z.string().optional(),
    neededOnly: z.boolean().optional(),
    blockedSpotters: z.array(z.string()).optional(),
    blockedPrefixes: z.array(z.string()).optional(),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('COMMAND'), command: z.string() }),
    z.object({ type: z.literal('SET_FILTER'), filter: SpotFilterSchema }),
    z.object({ type: z.literal('RELOAD_AWARDS') }),
    z.object({ type: z.literal('CONNECT') }),
    z.object({ type: z.literal('DISCONNECT') }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

const CommandBodySchema = z.object({ command: z.string() });
const ImportBodySchema = z.object({
    path: z.string().min(1),
    kind: z.enum(['challenge', 'grids']),
});
const ConfigBodySchema = z.record(z.unknown());

export type ServerMessage =
    | { type: 'WELCOME'; message: string; help: string }
    | { type: 'SPOTS_UPDATE'; spots: ClassifiedSpot[] }
    | { type: 'STATUS'; state: string; message: string }
    | { type: 'SOLAR'; solar: Extract<ClusterEvent, { type: 'solar' }>['solar'] }
    | { type: 'COMMAND'; status: string; text: string };

/** Parse one inbound WebSocket frame, or null when it is not a known message. */
export function parseClientMessage(raw: string): ClientMessage | null {
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch {
        return null;
    }
    const result = ClientMessageSchema.safeParse(data);
    return result.success ? result.data : null;
}

function queryString(value: unknown): string {
    if (typeof value === 'string') return value;
    if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
    return '';
}

/** ?band=20m,15m&grid=FN&prefix=K&view=needed */
export function parseSpotQuery(query: Record<string, unknown>): { view: SpotView; filter: SpotFilterOptions } {
    const bands = queryString(query.band)
        .split(',')
        .map(band => band.trim())
        .filter(Boolean);
    const grid = queryString(query.grid).trim();
    const entityPrefix = queryString(query.prefix).trim();
    const view: SpotView = queryString(query.view) === 'needed' ? 'needed' : 'all';

    const filter: SpotFilterOptions = {};
    if (bands.length > 0) filter.bands = bands;
    if (grid) filter.grid = grid;
    if (entityPrefix) filter.entityPrefix = entityPrefix;
    return { view, filter };
}

function firstIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    return issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid request';
}

export class WebServer {
    private app: express.Application;
    private server: http.Server;
    private wss: WebSocketServer;
    private config: Config;
    private monitor: SpotMonitor;

    constructor(config: Config, monitor: SpotMonitor) {
        this.config = config;
        this.monitor = monitor;
        this.app = express();
        this.server = http.createServer(this.app);
        this.wss = new WebSocketServer({ server: this.server });

        this.setupMiddleware();
        this.setupRoutes();
        this.setupWebSockets();
    }

    public getApp(): express.Application {
        return this.app;
    }

    private setupMiddleware() {
        // Display clients are served from elsewhere
        this.app.use((req, res, next) => {
            res.header('Access-Control-Allow-Origin', '*');
            res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
            res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');
            if (req.method === 'OPTIONS') {
                res.sendStatus(200);
                return;
            }
            next();
        });

        this.app.use(express.json());
    }

    private setupRoutes() {
        this.app.get('/api/status', (req, res) => {
            res.json(this.monitor.getSnapshot());
        });

        this.app.get('/api/spots', (req, res) => {
            const { view, filter } = parseSpotQuery(req.query);
            const spots = this.monitor.getSpots(view, { ...this.monitor.getFilter(), ...filter });
            res.json({ view, count: spots.length, spots });
        });

        this.app.get('/api/config', (req, res) => {
            res.json(this.config);
        });

        this.app.post('/api/config', async (req, res) => {
            const body = ConfigBodySchema.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ success: false, error: firstIssue(body.error) });
                return;
            }
            try {
                const newConfig = saveConfig(body.data);
                this.config = newConfig;
                await this.monitor.applyConfig(newConfig);
                res.json({
                    success: true,
                    config: newConfig,
                    message: 'Config saved and applied. Web port and data file paths take effect after a restart.',
                });
            } catch (error) {
                res.status(400).json({ success: false, error: describeError(error) });
            }
        });

        this.app.post('/api/connect', (req, res) => {
            if (this.monitor.connect()) {
                res.json({ success: true, state: this.monitor.getSnapshot().state });
            } else {
                res.status(400).json({ success: false, error: this.monitor.getSnapshot().status });
            }
        });

        this.app.post('/api/disconnect', async (req, res) => {
            try {
                await this.monitor.disconnect();
                res.json({ success: true, state: this.monitor.getSnapshot().state });
            } catch (error) {
                res.status(500).json({ success: false, error: describeError(error) });
            }
        });

        this.app.get('/api/command/help', (req, res) => {
            res.json({ help: CLUSTER_COMMAND_HELP });
        });

        this.app.post('/api/command', (req, res) => {
            const body = CommandBodySchema.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ success: false, error: firstIssue(body.error) });
                return;
            }
            try {
                this.monitor.sendCommand(body.data.command);
                res.json({ success: true, message: `Queued: ${body.data.command.trim()}` });
            } catch (error) {
                res.status(400).json({ success: false, error: describeError(error) });
            }
        });

        this.app.post('/api/filters', (req, res) => {
            const body = SpotFilterSchema.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ success: false, error: firstIssue(body.error) });
                return;
            }
            this.monitor.setFilter(body.data);
            res.json({ success: true, filter: this.monitor.getFilter() });
        });

        this.app.post('/api/awards/reload', async (req, res) => {
            try {
                const result = await this.monitor.reloadAwards();
                res.json({ success: true, result, stats: this.monitor.getSnapshot().challenge });
            } catch (error) {
                res.status(500).json({ success: false, error: describeError(error) });
            }
        });

        this.app.post('/api/awards/import', async (req, res) => {
            const body = ImportBodySchema.safeParse(req.body);
            if (!body.success) {
                res.status(400).json({ success: false, error: firstIssue(body.error) });
                return;
            }
            try {
                const result = await this.monitor.importAdif(body.data.path, body.data.kind);
                res.json({ success: true, result });
            } catch (error) {
                res.status(400).json({ success: false, error: describeError(error) });
            }
        });
    }

    private setupWebSockets() {
        this.wss.on('connection', (ws: WebSocket) => {
            console.log('Web client connected');

            this.send(ws, { type: 'WELCOME', message: 'Connected to DX Spot Monitor', help: CLUSTER_COMMAND_HELP });
            const snapshot = this.monitor.getSnapshot();
            this.send(ws, { type: 'STATUS', state: snapshot.state, message: snapshot.status });
            if (snapshot.solar) {
                this.send(ws, { type: 'SOLAR', solar: snapshot.solar });
            }
            this.send(ws, { type: 'SPOTS_UPDATE', spots: this.monitor.getSpots('all') });

            ws.on('message', (message) => {
                const data = parseClientMessage(message.toString());
                if (!data) {
                    console.warn('Ignoring invalid web client message');
                    return;
                }
                this.handleClientMessage(ws, data);
            });
        });

        this.monitor.on('rebuild', (spots: ClassifiedSpot[]) => {
            this.broadcast({ type: 'SPOTS_UPDATE', spots });
        });

        this.monitor.on('event', (event: ClusterEvent) => {
            switch (event.type) {
                case 'status':
                    this.broadcast({ type: 'STATUS', state: event.state, message: event.message });
                    break;
                case 'solar':
                    this.broadcast({ type: 'SOLAR', solar: event.solar });
                    break;
                case 'command':
                    this.broadcast({ type: 'COMMAND', status: event.status, text: event.text });
                    break;
                case 'spot':
                    // Spots reach clients through the throttled SPOTS_UPDATE
                    break;
            }
        });
    }

    private handleClientMessage(ws: WebSocket, data: ClientMessage): void {
        switch (data.type) {
            case 'COMMAND':
                try {
                    this.monitor.sendCommand(data.command);
                } catch (error) {
                    this.send(ws, { type: 'COMMAND', status: 'failed', text: describeError(error) });
                }
                break;
            case 'SET_FILTER':
                this.monitor.setFilter(data.filter);
                break;
            case 'CONNECT':
                if (!this.monitor.connect()) {
                    const snapshot = this.monitor.getSnapshot();
                    this.send(ws, { type: 'STATUS', state: snapshot.state, message: snapshot.status });
                }
                break;
            case 'DISCONNECT':
                this.monitor.disconnect().catch(error => {
                    console.error('Cluster disconnect failed:', describeError(error));
                });
                break;
            case 'RELOAD_AWARDS':
                this.monitor.reloadAwards().catch(error => {
                    console.error('Award reload failed:', describeError(error));
                });
                break;
        }
    }

    private send(ws: WebSocket, message: ServerMessage): void {
        if (ws.readyState === WebSocket.OPEN) {
            ws.send(JSON.stringify(message));
        }
    }

    private broadcast(message: ServerMessage): void {
        const json = JSON.stringify(message);

        this.wss.clients.forEach((client) => {
            if (client.readyState === WebSocket.OPEN) {
                client.send(json);
            }
        });
    }

    public start() {
        const port = this.config.web.port;
        this.server.listen(port, () => {
            console.log(`Web dashboard feed at http://localhost:${port}`);
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve) => {
            this.wss.clients.forEach(client => client.terminate());
            this.wss.close();
            this.server.close(() => resolve());
        });
    }
}
