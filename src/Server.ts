import { debug } from "./debug";
import { error } from "./error";
import { log } from "./log";
import { registerApiRoutes } from "./registerApiRoutes";
import { verbose } from "./verbose";
import { warn } from "./warn";
import Fastify from "fastify";
import WebSocket from "ws";
import type { DeviceManager } from "./DeviceManager";
import type { Duplex } from "stream";
import type { FastifyInstance } from "fastify";
import type { IncomingMessage } from "http";
import type { IpcObjectSnapshot } from "./IpcObjectSnapshot";
import type { IpcValue } from "./IpcValue";
import type { MonitorMessage } from "./MonitorMessage";
import type { ObjectTree } from "./ObjectTree";

export interface ServerOptions {
    manager: DeviceManager;
    tree: ObjectTree;
    host: string;
    port: number;
    version: string;
}

/**
 * Local monitor endpoint: an HTTP status API and a WebSocket feed (`/ws`)
 * that mirrors the IPC object tree to monitoring software.
 */
export class Server {
    #fastify: FastifyInstance;
    #wss: WebSocket.WebSocketServer;
    #tree: ObjectTree;
    #host: string;
    #port: number;
    #connections: Set<WebSocket> = new Set();
    #detachTree: () => void = () => {};
    readonly startTime: number;

    constructor(options: ServerOptions) {
        this.#tree = options.tree;
        this.#host = options.host;
        this.#port = options.port;
        this.startTime = Date.now();

        // Route fastify's pino output through our own log functions
        const customLogger = {
            level: "info",
            stream: {
                write: (msg: string): void => {
                    Server.#forwardLog(msg);
                }
            }
        };

        this.#fastify = Fastify({ logger: customLogger });
        this.#wss = new WebSocket.WebSocketServer({ noServer: true });

        registerApiRoutes(this.#fastify, {
            manager: options.manager,
            tree: options.tree,
            startTime: this.startTime,
            version: options.version
        });
        this.#setupWebSocket();
        this.#setupUpgradeHandling();
        this.#setupTreeForwarding();
    }

    get fastify(): FastifyInstance {
        return this.#fastify;
    }

    /** Starts listening and returns the bound address. */
    async start(): Promise<string> {
        const address = await this.#fastify.listen({ host: this.#host, port: this.#port });
        log(`Monitor listening at ${address}, WS at ${address.replace(/^http/, "ws")}/ws`);
        return address;
    }

    async stop(): Promise<void> {
        this.#detachTree();
        for (const socket of this.#connections) {
            socket.terminate();
        }
        this.#connections.clear();
        this.#wss.close();
        await this.#fastify.close();
        debug("Monitor server shut down");
    }

    broadcast(message: MonitorMessage): void {
        const text = JSON.stringify(message);
        for (const socket of this.#connections) {
            if (socket.readyState === WebSocket.OPEN) {
                try {
                    socket.send(text);
                } catch (err) {
                    verbose("Failed to send to monitor client:", err);
                }
            }
        }
    }

    #setupWebSocket(): void {
        this.#wss.on("connection", (socket: WebSocket, req: IncomingMessage) => {
            debug(`Monitor connection opened from ${req.socket.remoteAddress}`);
            this.#connections.add(socket);

            const snapshot: MonitorMessage = {
                type: "snapshot",
                portalId: this.#tree.portalId,
                objects: this.#tree.snapshot()
            };
            socket.send(JSON.stringify(snapshot));

            socket.on("close", () => {
                verbose(`Monitor connection closed from ${req.socket.remoteAddress}`);
                this.#connections.delete(socket);
            });

            socket.on("error", (err: Error) => {
                verbose(`Monitor connection error from ${req.socket.remoteAddress}:`, err);
                this.#connections.delete(socket);
            });
        });
    }

    #setupUpgradeHandling(): void {
        this.#fastify.server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer): void => {
            const url = request.url || "";
            if (url.startsWith("/ws")) {
                this.#wss.handleUpgrade(request, socket, head, (ws: WebSocket): void => {
                    this.#wss.emit("connection", ws, request);
                });
            } else {
                socket.write("HTTP/1.1 400 Bad Request\r\n\r\n");
                socket.destroy();
            }
        });
    }

    #setupTreeForwarding(): void {
        const onAdded = (object: IpcObjectSnapshot): void => {
            this.broadcast({ type: "object_added", object });
        };
        const onChanged = (path: string, attribute: string, value: IpcValue): void => {
            this.broadcast({ type: "attribute_changed", path, attribute, value });
        };
        const onRemoved = (path: string): void => {
            this.broadcast({ type: "object_removed", path });
        };

        this.#tree.on("object_added", onAdded);
        this.#tree.on("attribute_changed", onChanged);
        this.#tree.on("object_removed", onRemoved);
        this.#detachTree = (): void => {
            this.#tree.off("object_added", onAdded);
            this.#tree.off("attribute_changed", onChanged);
            this.#tree.off("object_removed", onRemoved);
        };
    }

    static #forwardLog(msg: string): void {
        let entry: unknown;
        try {
            entry = JSON.parse(msg.trim());
        } catch {
            debug(`[Fastify] ${msg.trim()}`);
            return;
        }
        if (typeof entry !== "object" || entry === null) {
            debug(`[Fastify] ${msg.trim()}`);
            return;
        }

        const level = "level" in entry && typeof entry.level === "number" ? entry.level : 30;
        const message = "msg" in entry && typeof entry.msg === "string" ? entry.msg : "";

        // pino levels: 20 debug, 30 info, 40 warn, 50 error
        if (level <= 30) {
            verbose(`[Fastify] ${message}`);
        } else if (level <= 40) {
            warn(`[Fastify] ${message}`);
        } else {
            error(`[Fastify] ${message}`);
        }
    }
}
