import WebSocket, { WebSocketServer } from "ws";
import {
	createLogger,
	describeError,
	type Notifier,
	type SignalEvent,
} from "@longwatch/core";
import { GATEWAY_COMMAND_TYPES, parseGatewayCommand } from "./commands";
import { executeGatewayCommand, type GatewayHandlers } from "./dispatch";

const logger = createLogger("ws-gateway");

export interface WsGatewayOptions {
	port: number;
	host?: string;
	maxPayloadBytes?: number;
	maxBufferedBytes?: number;
	/** 0 disables ping/pong liveness checks. */
	heartbeatIntervalMs?: number;
}

interface ClientState {
	alive: boolean;
	connectedAt: number;
}

const rawToString = (data: WebSocket.RawData): string => {
	if (Buffer.isBuffer(data)) {
		return data.toString("utf8");
	}
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString("utf8");
	}
	return Buffer.from(data).toString("utf8");
};

/**
 * WebSocket surface of the scanner. Broadcasts every signal event to all
 * connected clients and accepts JSON commands, replying on the same socket.
 */
export class WsGateway implements Notifier {
	private server: WebSocketServer | null = null;
	private heartbeat: ReturnType<typeof setInterval> | null = null;
	private handlers: GatewayHandlers | null = null;
	private readonly clients = new Map<WebSocket, ClientState>();

	constructor(private readonly options: WsGatewayOptions) {}

	get clientCount(): number {
		return this.clients.size;
	}

	/**
	 * Handlers are bound after construction because the lifecycle manager
	 * takes the gateway as its notifier.
	 */
	bind(handlers: GatewayHandlers): void {
		this.handlers = handlers;
	}

	/**
	 * @returns the port actually bound, which differs from the option when it is 0
	 */
	async start(): Promise<number> {
		if (this.server) {
			throw new Error("Gateway already started");
		}
		const server = new WebSocketServer({
			port: this.options.port,
			host: this.options.host,
			maxPayload: this.options.maxPayloadBytes ?? 16 * 1024,
		});
		this.server = server;
		server.on("connection", (ws: WebSocket) => this.onConnection(ws));
		server.on("error", (err) => logger.error("gateway_error", { error: describeError(err) }));

		await new Promise<void>((resolve, reject) => {
			server.once("listening", () => resolve());
			server.once("error", reject);
		});

		const address = server.address();
		const port = address !== null && typeof address === "object" ? address.port : this.options.port;
		this.startHeartbeat();
		logger.info("gateway_listening", { port, host: this.options.host ?? null });
		return port;
	}

	async publish(event: SignalEvent): Promise<void> {
		const payload = JSON.stringify({
			type: "signal_event",
			event: event.type,
			previousStatus: event.previousStatus ?? null,
			signal: event.signal,
		});
		for (const ws of this.clients.keys()) {
			this.safeSend(ws, payload);
		}
	}

	async close(): Promise<void> {
		if (this.heartbeat) {
			clearInterval(this.heartbeat);
			this.heartbeat = null;
		}
		const server = this.server;
		if (!server) {
			return;
		}
		this.server = null;
		for (const ws of this.clients.keys()) {
			ws.terminate();
		}
		this.clients.clear();
		await new Promise<void>((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
		});
		logger.info("gateway_closed", {});
	}

	private onConnection(ws: WebSocket): void {
		this.clients.set(ws, { alive: true, connectedAt: Date.now() });
		logger.info("client_connected", { clients: this.clients.size });

		ws.on("pong", () => {
			const state = this.clients.get(ws);
			if (state) {
				state.alive = true;
			}
		});
		ws.on("message", (data: WebSocket.RawData) => {
			void this.onMessage(ws, rawToString(data));
		});
		ws.on("close", () => {
			this.clients.delete(ws);
			logger.info("client_disconnected", { clients: this.clients.size });
		});
		ws.on("error", (err) => {
			logger.warn("client_error", { error: describeError(err) });
		});

		this.sendJson(ws, { type: "hello", commands: GATEWAY_COMMAND_TYPES });
	}

	private async onMessage(ws: WebSocket, raw: string): Promise<void> {
		const parsed = parseGatewayCommand(raw);
		if (!parsed.ok) {
			this.sendJson(ws, { type: "reply", requestId: parsed.requestId, ok: false, error: parsed.error });
			return;
		}
		const { command, requestId } = parsed;
		if (!this.handlers) {
			this.sendJson(ws, { type: "reply", requestId, ok: false, error: "gateway is not ready" });
			return;
		}
		try {
			const result = await executeGatewayCommand(command, this.handlers);
			logger.info("command_handled", { command: command.type, ok: result.ok });
			this.sendJson(ws, { type: "reply", requestId, command: command.type, ...result });
		} catch (err) {
			logger.error("command_failed", { command: command.type, error: describeError(err) });
			this.sendJson(ws, {
				type: "reply",
				requestId,
				command: command.type,
				ok: false,
				error: "internal error",
			});
		}
	}

	private startHeartbeat(): void {
		const interval = this.options.heartbeatIntervalMs ?? 30_000;
		if (interval <= 0) {
			return;
		}
		this.heartbeat = setInterval(() => {
			for (const [ws, state] of this.clients) {
				if (!state.alive) {
					logger.warn("client_unresponsive", { connectedAt: state.connectedAt });
					ws.terminate();
					continue;
				}
				state.alive = false;
				ws.ping();
			}
		}, interval);
		this.heartbeat.unref();
	}

	private sendJson(ws: WebSocket, payload: Record<string, unknown>): void {
		this.safeSend(ws, JSON.stringify(payload));
	}

	private safeSend(ws: WebSocket, payload: string): void {
		if (ws.readyState !== WebSocket.OPEN) {
			return;
		}
		const limit = this.options.maxBufferedBytes ?? 1_000_000;
		if (ws.bufferedAmount > limit) {
			logger.warn("client_dropped_slow", { bufferedAmount: ws.bufferedAmount });
			ws.terminate();
			return;
		}
		try {
			ws.send(payload);
		} catch (err) {
			logger.warn("send_failed", { error: describeError(err) });
		}
	}
}
