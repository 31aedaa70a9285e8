import { describe, it, expect, beforeEach } from "vitest";
import { MemoryStore } from "./fakes/MemoryStore";
import { ObjectTree } from "../src/ObjectTree";
import { ServiceExposer } from "../src/ServiceExposer";
import { StorageUnavailableError } from "../src/StorageUnavailableError";
import type { ServiceInstance } from "../src/ServiceInstance";

function instance(serviceKey: string, serviceType: string, deviceInstance: number, clientId = "fe001"): ServiceInstance {
    return { clientId, serviceKey, serviceType, deviceInstance, active: true };
}

describe("ServiceExposer", () => {
    let store: MemoryStore;
    let tree: ObjectTree;
    let exposer: ServiceExposer;

    beforeEach(() => {
        store = new MemoryStore();
        tree = new ObjectTree("portal1");
        exposer = new ServiceExposer({
            ipcBus: tree,
            store,
            pathPrefix: "mqttdevices",
            processName: "mqtt-devices",
            version: "1.2.3"
        });
    });

    it("exposes a known service with management and catalog attributes", async () => {
        const exposed = await exposer.expose(instance("t1", "temperature", 0));

        expect(exposed.handle.path).toBe("mqttdevices.temperature.0");
        expect(tree.get("mqttdevices.temperature.0")?.attributes).toEqual({
            "Mgmt/ProcessName": "mqtt-devices",
            "Mgmt/ProcessVersion": "1.2.3",
            "Mgmt/Connection": "MQTT fe001/t1",
            DeviceInstance: 0,
            ProductName: "Temperature sensor",
            CustomName: "",
            Connected: 1,
            Temperature: null,
            Pressure: null,
            Humidity: null
        });
    });

    it("exposes an unknown service type as a generic placeholder", async () => {
        const exposed = await exposer.expose(instance("x", "widget", 4));

        expect(exposed.definition.productName).toBe("Generic device");
        expect(tree.get("mqttdevices.widget.4")?.attributes.ProductName).toBe("Generic device");
        expect(tree.get("mqttdevices.widget.4")?.attributes).not.toHaveProperty("Temperature");
    });

    it("uses the stored custom name", async () => {
        store.data.set("customname/tank/2", "Fresh water");

        await exposer.expose(instance("tank", "tank", 2));

        expect(tree.get("mqttdevices.tank.2")?.attributes.CustomName).toBe("Fresh water");
    });

    it("falls back to an empty custom name when the store cannot be read", async () => {
        store.failReads = true;

        await exposer.expose(instance("t1", "temperature", 0));

        expect(tree.get("mqttdevices.temperature.0")?.attributes.CustomName).toBe("");
    });

    it("replaces an existing object for the same service", async () => {
        await exposer.expose(instance("t1", "temperature", 0));
        await exposer.expose(instance("t1", "tank", 3));

        expect(tree.snapshot().map((object) => object.path)).toEqual(["mqttdevices.tank.3"]);
        expect(exposer.size).toBe(1);
    });

    it("retracts single services and whole clients", async () => {
        await exposer.expose(instance("t1", "temperature", 0));
        await exposer.expose(instance("t2", "temperature", 1));
        await exposer.expose(instance("t1", "temperature", 2, "fe002"));

        expect(exposer.retract("fe001", "t2")).toBe(true);
        expect(exposer.retract("fe001", "t2")).toBe(false);
        expect(exposer.retractClient("fe001")).toBe(1);

        expect(tree.snapshot().map((object) => object.path)).toEqual(["mqttdevices.temperature.2"]);
        expect(exposer.isExposed("fe002", "t1")).toBe(true);
        expect(exposer.retractAll()).toBe(1);
        expect(tree.size).toBe(0);
    });

    it("finds exposed services by type and instance", async () => {
        await exposer.expose(instance("t1", "temperature", 0));

        expect(exposer.find("temperature", 0)?.instance.serviceKey).toBe("t1");
        expect(exposer.find("temperature", 1)).toBeUndefined();
    });

    describe("setCustomName", () => {
        it("stores the name and updates the live object", async () => {
            await exposer.expose(instance("t1", "temperature", 0));

            await exposer.setCustomName("temperature", 0, "Engine room");

            expect(store.data.get("customname/temperature/0")).toBe("Engine room");
            expect(tree.get("mqttdevices.temperature.0")?.attributes.CustomName).toBe("Engine room");
        });

        it("stores the name of a service that is not exposed", async () => {
            await exposer.setCustomName("tank", 5, "Grey water");

            expect(store.data.get("customname/tank/5")).toBe("Grey water");
            expect(tree.size).toBe(0);
        });

        it("rejects with StorageUnavailableError when the name cannot be stored", async () => {
            await exposer.expose(instance("t1", "temperature", 0));
            store.failAfterWrites = 0;

            await expect(exposer.setCustomName("temperature", 0, "Cabin")).rejects.toBeInstanceOf(
                StorageUnavailableError
            );
            expect(tree.get("mqttdevices.temperature.0")?.attributes.CustomName).toBe("");
        });
    });
});
