import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DeviceManager } from "../src/DeviceManager";
import { FakeMessageBus } from "./fakes/FakeMessageBus";
import { LogLevel } from "../src/LogLevel";
import { MemoryStore } from "./fakes/MemoryStore";
import { ObjectTree } from "../src/ObjectTree";
import { Server } from "../src/Server";
import { setConsoleLevel } from "../src/consoleLevel";

describe("Server", () => {
    let server: Server;

    beforeEach(() => {
        const tree = new ObjectTree("portal1");
        const manager = new DeviceManager({ store: new MemoryStore(), ipcBus: tree, messageBus: new FakeMessageBus() });
        server = new Server({ manager, tree, host: "127.0.0.1", port: 0, version: "1.2.3" });
    });

    afterEach(async () => {
        setConsoleLevel(LogLevel.Silent);
        vi.restoreAllMocks();
        await server.stop();
    });

    it("routes fastify warnings to the warning log", () => {
        setConsoleLevel(LogLevel.Log);
        const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
        const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

        server.fastify.log.warn("slow request");

        expect(warnSpy).toHaveBeenCalledWith("[Fastify] slow request");
        expect(logSpy).not.toHaveBeenCalled();
    });

    it("routes fastify errors to the error log", () => {
        setConsoleLevel(LogLevel.Log);
        const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

        server.fastify.log.error("handler failed");

        expect(errorSpy).toHaveBeenCalledWith("[Fastify] handler failed");
    });

    it("serves the status API", async () => {
        const response = await server.fastify.inject({ method: "GET", url: "/api/status" });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toMatchObject({ portalId: "portal1", version: "1.2.3", clients: 0, objects: 0 });
    });
});
