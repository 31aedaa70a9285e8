import { describe, it, expect, vi } from "vitest";
import { ObjectTree } from "../src/ObjectTree";

describe("ObjectTree", () => {
    it("registers objects and reports them", () => {
        const tree = new ObjectTree("portal1");
        const added = vi.fn();
        tree.on("object_added", added);

        const handle = tree.register("mqttdevices.temperature.0", { Temperature: null, DeviceInstance: 0 });

        expect(handle.path).toBe("mqttdevices.temperature.0");
        expect(tree.size).toBe(1);
        expect(tree.get("mqttdevices.temperature.0")).toEqual({
            path: "mqttdevices.temperature.0",
            attributes: { Temperature: null, DeviceInstance: 0 }
        });
        expect(added).toHaveBeenCalledWith({
            path: "mqttdevices.temperature.0",
            attributes: { Temperature: null, DeviceInstance: 0 }
        });
    });

    it("refuses a second object on the same path", () => {
        const tree = new ObjectTree("portal1");
        tree.register("a", {});

        expect(() => tree.register("a", {})).toThrow("IPC object a is already registered");
    });

    it("updates declared attributes only", () => {
        const tree = new ObjectTree("portal1");
        const changed = vi.fn();
        tree.on("attribute_changed", changed);
        const handle = tree.register("a", { Temperature: null });

        tree.update(handle, "Temperature", 21.5);
        tree.update(handle, "Temperature", 21.5);

        expect(tree.get("a")?.attributes.Temperature).toBe(21.5);
        expect(changed).toHaveBeenCalledTimes(1);
        expect(changed).toHaveBeenCalledWith("a", "Temperature", 21.5);
        expect(() => tree.update(handle, "Voltage", 12)).toThrow("IPC object a has no attribute Voltage");
    });

    it("unregisters idempotently", () => {
        const tree = new ObjectTree("portal1");
        const removed = vi.fn();
        tree.on("object_removed", removed);
        const handle = tree.register("a", {});

        tree.unregister(handle);
        tree.unregister(handle);

        expect(tree.size).toBe(0);
        expect(removed).toHaveBeenCalledTimes(1);
        expect(() => tree.update(handle, "x", 1)).toThrow("IPC object a is not registered");
    });

    it("ignores a stale handle for a re-registered path", () => {
        const tree = new ObjectTree("portal1");
        const stale = tree.register("a", { Level: 1 });
        tree.unregister(stale);
        tree.register("a", { Level: 2 });

        tree.unregister(stale);

        expect(tree.get("a")?.attributes.Level).toBe(2);
    });

    it("returns a sorted snapshot that does not alias its state", () => {
        const tree = new ObjectTree("portal1");
        tree.register("b", { x: 1 });
        tree.register("a", { x: 2 });

        const snapshot = tree.snapshot();
        snapshot[0].attributes.x = 99;

        expect(snapshot.map((object) => object.path)).toEqual(["a", "b"]);
        expect(tree.get("a")?.attributes.x).toBe(2);
    });
});
