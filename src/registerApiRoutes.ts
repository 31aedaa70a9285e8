import { CustomNameBodySchema } from "./CustomNameBodySchema";
import { ServiceParamsSchema } from "./ServiceParamsSchema";
import { StorageUnavailableError } from "./StorageUnavailableError";
import { describeZodError } from "./describeZodError";
import type { DeviceManager } from "./DeviceManager";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { ObjectTree } from "./ObjectTree";

export interface ApiDependencies {
    manager: DeviceManager;
    tree: ObjectTree;
    startTime: number;
    version: string;
}

export function registerApiRoutes(fastify: FastifyInstance, deps: ApiDependencies): void {
    const { manager, tree, startTime, version } = deps;

    fastify.get("/api/status", async () => {
        return {
            portalId: tree.portalId,
            version,
            startTime,
            uptime: Date.now() - startTime,
            clients: manager.clients().length,
            objects: tree.size,
            droppedAnnouncements: manager.listener.dropped
        };
    });

    fastify.get("/api/devices", async () => {
        return { clients: manager.clients() };
    });

    fastify.get("/api/objects", async () => {
        return { objects: tree.snapshot() };
    });

    fastify.put(
        "/api/services/:serviceType/:deviceInstance/name",
        async (request: FastifyRequest, reply: FastifyReply) => {
            const params = ServiceParamsSchema.safeParse(request.params);
            if (!params.success) {
                return reply.code(400).send({ error: describeZodError(params.error) });
            }
            const body = CustomNameBodySchema.safeParse(request.body);
            if (!body.success) {
                return reply.code(400).send({ error: describeZodError(body.error) });
            }

            const { serviceType, deviceInstance } = params.data;
            try {
                await manager.setCustomName(serviceType, deviceInstance, body.data.name);
            } catch (err) {
                if (err instanceof StorageUnavailableError) {
                    return reply.code(503).send({ error: err.message });
                }
                throw err;
            }
            return { serviceType, deviceInstance, name: body.data.name };
        }
    );
}
