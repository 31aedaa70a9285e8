import { DeviceManager } from "./DeviceManager";
import { JsonFileStore } from "./JsonFileStore";
import { MqttMessageBus } from "./MqttMessageBus";
import { ObjectTree } from "./ObjectTree";
import { Server } from "./Server";
import { VERSION } from "./version";
import { createPromise } from "./createPromise";
import { debug } from "./debug";
import { error } from "./error";
import { getPortalId } from "./getPortalId";
import { log } from "./log";
import type { Config } from "./Config";

export async function main(config: Config): Promise<void> {
    const store = new JsonFileStore(config.storageFile);
    const tree = new ObjectTree(getPortalId(config.portalId));
    const messageBus = MqttMessageBus.connect({
        url: config.mqttUrl,
        clientId: config.mqttClientId,
        username: config.mqttUsername,
        password: config.mqttPassword,
        caFile: config.mqttCaFile
    });

    const manager = new DeviceManager({ store, ipcBus: tree, messageBus, pathPrefix: config.pathPrefix });
    await manager.start();
    log(`mqtt-devices v${VERSION} running, portal id ${tree.portalId}, settings in ${store.path}`);

    let server: Server | undefined;
    if (config.monitorEnabled) {
        server = new Server({
            manager,
            tree,
            host: config.monitorHost,
            port: config.monitorPort,
            version: VERSION
        });
        await server.start();
    }

    const shutdown = createPromise<string>();
    process.once("SIGINT", (): void => shutdown.resolve("SIGINT"));
    process.once("SIGTERM", (): void => shutdown.resolve("SIGTERM"));

    const signal = await shutdown.promise;
    log(`Received ${signal}, shutting down...`);

    try {
        await server?.stop();
        await manager.stop();
    } finally {
        await messageBus.close().catch((err: unknown) => {
            error("Failed to close MQTT connection:", err);
        });
        debug("Shutdown complete");
    }
}
