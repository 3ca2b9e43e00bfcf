import { EventEmitter } from 'events';
import net from 'net';
import { parseLine } from './LineProtocolParser';
import type { ClusterEvent, ConnectionState } from './types';
import { AsyncQueue } from '../util/AsyncQueue';
import { AbortError, describeError, isAbortError, sleep } from '../util/abort';

// The subset of net.Socket the link relies on
export interface ClusterSocket extends EventEmitter {
    write(data: string, callback?: (error?: Error | null) => void): boolean;
    destroy(): void;
}

export type SocketFactory = (host: string, port: number) => ClusterSocket;

export interface ClusterLinkOptions {
    host: string;
    port: number;
    callsign: string;
    loginCommands?: string[];
    reconnectDelayMs?: number;
    connectTimeoutMs?: number;
    bannerLines?: number;
    bannerTimeoutMs?: number;
    socketFactory?: SocketFactory;
    now?: () => number;
}

export const DEFAULT_RECONNECT_DELAY_MS = 5000;
export const DEFAULT_LOGIN_COMMANDS = ['set/nofilter', 'set/ve7cc', 'set/skimmer', 'set/nodedupe'];

// A partial line longer than this without a newline is garbage
const MAX_PENDING_LINE = 8192;

const createTcpSocket: SocketFactory = (host, port) => {
    const socket = net.createConnection({ host, port });
    socket.setEncoding('utf-8');
    socket.setKeepAlive(true, 60000);
    return socket;
};

/**
 * One outbound connection to a DX cluster node.
 *
 * The link logs in, streams lines through the parser and keeps reconnecting
 * after a fixed delay until `stop()` is called. Everything it observes is
 * reported as a ClusterEvent on the 'event' channel.
 */
export class ClusterLink extends EventEmitter {
    private readonly host: string;
    private readonly port: number;
    private readonly callsign: string;
    private readonly loginCommands: string[];
    private readonly reconnectDelayMs: number;
    private readonly connectTimeoutMs: number;
    private readonly bannerLines: number;
    private readonly bannerTimeoutMs: number;
    private readonly socketFactory: SocketFactory;
    private readonly now: () => number;

    private state: ConnectionState = 'idle';
    private readonly commands = new AsyncQueue<string>();
    private stopController: AbortController | null = null;
    private runTask: Promise<void> | null = null;
    private socket: ClusterSocket | null = null;
    private lineBuffer: string = '';
    private bannerRemaining: number = 0;
    private bannerDone: (() => void) | null = null;

    constructor(options: ClusterLinkOptions) {
        super();
        if (!options.callsign.trim()) {
            throw new Error('A callsign is required to log in to the cluster');
        }
        this.host = options.host;
        this.port = options.port;
        this.callsign = options.callsign.trim().toUpperCase();
        this.loginCommands = options.loginCommands ?? DEFAULT_LOGIN_COMMANDS;
        this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
        this.connectTimeoutMs = options.connectTimeoutMs ?? 15000;
        this.bannerLines = options.bannerLines ?? 5;
        this.bannerTimeoutMs = options.bannerTimeoutMs ?? 3000;
        this.socketFactory = options.socketFactory ?? createTcpSocket;
        this.now = options.now ?? Date.now;
    }

    public getState(): ConnectionState {
        return this.state;
    }

    public isStreaming(): boolean {
        return this.state === 'streaming';
    }

    public getPendingCommands(): number {
        return this.commands.size;
    }

    public getEndpoint(): string {
        return `${this.host}:${this.port}`;
    }

    public start(): void {
        if (this.runTask) {
            console.warn('Cluster link already running');
            return;
        }

        const controller = new AbortController();
        this.stopController = controller;
        this.runTask = this.run(controller.signal).finally(() => {
            this.runTask = null;
            this.stopController = null;
        });
    }

    /**
     * Tear the link down from any state. Queued commands are discarded and a
     * pending reconnect wait is cut short.
     */
    public async stop(): Promise<void> {
        const task = this.runTask;
        const controller = this.stopController;
        if (!task || !controller) {
            if (this.state !== 'stopped') {
                this.setState('disconnecting', 'Disconnecting from cluster...');
                this.discardCommands();
                this.setState('stopped', 'Cluster link stopped');
            }
            return;
        }

        if (!controller.signal.aborted) {
            this.setState('disconnecting', 'Disconnecting from cluster...');
            this.discardCommands();
            controller.abort();
            this.socket?.destroy();
        }

        await task;
    }

    /**
     * Queue a command line for the cluster. It is written once the link is
     * streaming, in the order commands were queued.
     */
    public send(command: string): void {
        this.commands.push(command);
    }

    private discardCommands(): void {
        const dropped = this.commands.clear();
        if (dropped.length > 0) {
            console.log(`Discarded ${dropped.length} queued cluster command(s)`);
        }
    }

    private async run(stopSignal: AbortSignal): Promise<void> {
        while (!stopSignal.aborted) {
            let reason = 'Cluster disconnected';
            try {
                await this.runSession(stopSignal);
            } catch (error) {
                reason = describeError(error);
            }

            if (stopSignal.aborted) break;

            const seconds = this.reconnectDelayMs / 1000;
            this.setState('reconnecting', `Cluster lost, retrying in ${seconds}s... (${reason})`);
            try {
                await sleep(this.reconnectDelayMs, stopSignal);
            } catch (error) {
                if (isAbortError(error)) break;
                throw error;
            }
        }

        this.setState('stopped', 'Cluster link stopped');
    }

    private async runSession(stopSignal: AbortSignal): Promise<void> {
        this.setState('connecting', `Connecting to ${this.getEndpoint()}...`);
        const socket = await this.openSocket(stopSignal);

        const session = new AbortController();
        const endSession = () => session.abort();
        stopSignal.addEventListener('abort', endSession, { once: true });

        this.socket = socket;
        this.lineBuffer = '';
        const closed = this.watchSocket(socket, session);
        let writer: Promise<void> = Promise.resolve();

        try {
            this.setState('authenticating', `Connected to ${this.getEndpoint()}, logging in as ${this.callsign}`);
            const banner = this.expectBanner(session.signal);
            await this.login(socket);
            await Promise.race([banner, closed]);

            if (!session.signal.aborted) {
                this.setState('streaming', `Cluster connected (${this.getEndpoint()})`);
                writer = this.drainCommands(socket, session.signal);
            }

            const error = await closed;
            throw error ?? new Error('Cluster disconnected');
        } finally {
            session.abort();
            stopSignal.removeEventListener('abort', endSession);
            socket.destroy();
            this.socket = null;
            this.bannerDone = null;
            await writer;
        }
    }

    private openSocket(stopSignal: AbortSignal): Promise<ClusterSocket> {
        return new Promise((resolve, reject) => {
            const socket = this.socketFactory(this.host, this.port);
            let settled = false;

            const onAbort = () => fail(new AbortError('Connect cancelled'));
            const timer = setTimeout(() => {
                fail(new Error(`Connection to ${this.getEndpoint()} timed out`));
            }, this.connectTimeoutMs);

            const cleanup = () => {
                clearTimeout(timer);
                stopSignal.removeEventListener('abort', onAbort);
            };

            const fail = (error: Error) => {
                if (settled) return;
                settled = true;
                cleanup();
                socket.destroy();
                reject(error);
            };

            socket.once('connect', () => {
                if (settled) return;
                settled = true;
                cleanup();
                resolve(socket);
            });
            // Stays attached for the socket's lifetime so a late error never goes unhandled
            socket.on('error', (error: Error) => fail(error));
            socket.once('close', () => fail(new Error('Connection closed before it was established')));
            stopSignal.addEventListener('abort', onAbort, { once: true });
        });
    }

    /**
     * Resolves with the socket error, or null on a clean close or when the
     * session is ended locally. Never rejects.
     */
    private watchSocket(socket: ClusterSocket, session: AbortController): Promise<Error | null> {
        return new Promise(resolve => {
            let settled = false;
            const finish = (error: Error | null) => {
                if (settled) return;
                settled = true;
                session.abort();
                resolve(error);
            };

            socket.on('data', (chunk: Buffer | string) => {
                if (settled) return;
                this.handleData(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
            });
            socket.on('error', (error: Error) => finish(error));
            socket.on('end', () => finish(null));
            socket.on('close', () => finish(null));
            session.signal.addEventListener('abort', () => finish(null), { once: true });
        });
    }

    private async login(socket: ClusterSocket): Promise<void> {
        await this.writeLine(socket, this.callsign);
        for (const command of this.loginCommands) {
            await this.writeLine(socket, command);
        }
    }

    // Welcome banners differ between node operators; the first few lines are dropped unread
    private expectBanner(signal: AbortSignal): Promise<void> {
        this.bannerRemaining = this.bannerLines;
        if (this.bannerRemaining === 0) {
            return Promise.resolve();
        }

        return new Promise(resolve => {
            const done = () => {
                clearTimeout(timer);
                signal.removeEventListener('abort', done);
                this.bannerRemaining = 0;
                this.bannerDone = null;
                resolve();
            };
            const timer = setTimeout(done, this.bannerTimeoutMs);
            this.bannerDone = done;
            signal.addEventListener('abort', done, { once: true });
        });
    }

    private async drainCommands(socket: ClusterSocket, signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            let command: string;
            try {
                command = await this.commands.take(signal);
            } catch (error) {
                if (isAbortError(error)) return;
                throw error;
            }

            const text = command.trim();
            try {
                await this.writeLine(socket, command);
                console.log(`Sent cluster command: ${text}`);
                this.emitEvent({ type: 'command', status: 'sent', text });
            } catch (error) {
                // A dead socket shows up on the read side; the link reconnects from there
                console.error(`Failed to send cluster command "${text}":`, describeError(error));
                this.emitEvent({ type: 'command', status: 'failed', text: `${text} (${describeError(error)})` });
            }
        }
    }

    private writeLine(socket: ClusterSocket, text: string): Promise<void> {
        const line = text.endsWith('\n') ? text : `${text}\n`;
        return new Promise((resolve, reject) => {
            try {
                socket.write(line, error => (error ? reject(error) : resolve()));
            } catch (error) {
                reject(error instanceof Error ? error : new Error(String(error)));
            }
        });
    }

    private handleData(chunk: string): void {
        this.lineBuffer += chunk;
        const lines = this.lineBuffer.split('\n');
        this.lineBuffer = lines.pop() ?? '';
        if (this.lineBuffer.length > MAX_PENDING_LINE) {
            this.lineBuffer = '';
        }

        for (const line of lines) {
            this.handleLine(line.replace(/\r$/, ''));
        }
    }

    private handleLine(line: string): void {
        if (this.state === 'authenticating' && this.bannerRemaining > 0) {
            this.bannerRemaining--;
            if (this.bannerRemaining === 0) {
                this.bannerDone?.();
            }
            return;
        }

        if (this.state !== 'authenticating' && this.state !== 'streaming') {
            return;
        }

        const result = parseLine(line, this.now());
        switch (result.kind) {
            case 'spot':
                this.emitEvent({ type: 'spot', spot: result.spot });
                break;
            case 'solar':
                this.emitEvent({ type: 'solar', solar: result.solar });
                break;
            case 'ignore':
                // Anything that is not a spot is most likely a reply to a command
                if (result.reason !== 'blank') {
                    this.emitEvent({ type: 'command', status: 'response', text: line.trim() });
                }
                break;
        }
    }

    private setState(state: ConnectionState, message: string): void {
        this.state = state;
        console.log(`[cluster] ${message}`);
        this.emitEvent({ type: 'status', state, message });
    }

    private emitEvent(event: ClusterEvent): void {
        this.emit('event', event);
    }
}
