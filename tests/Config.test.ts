import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Config } from "../src/Config";
import { mkdtemp, rm } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { writeFileSync } from "fs";

describe("Config", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "mqtt-devices-config-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    function writeConfig(content: unknown): string {
        const path = join(dir, "config.json");
        writeFileSync(path, JSON.stringify(content), "utf8");
        return path;
    }

    it("uses defaults when nothing is configured", () => {
        const config = new Config(undefined, [], {});

        expect(config.mqttUrl).toBe("mqtt://localhost:1883");
        expect(config.mqttUsername).toBeNull();
        expect(config.pathPrefix).toBe("mqttdevices");
        expect(config.portalId).toBeNull();
        expect(config.monitorEnabled).toBe(true);
        expect(config.monitorHost).toBe("127.0.0.1");
        expect(config.monitorPort).toBe(8326);
        expect(config.logLevel).toBe("log");
        expect(config.mqttClientId).toBe(`mqtt-devices-${process.pid}`);
    });

    it("reads long and short options from the command line", () => {
        const config = new Config(undefined, ["--mqtt-server", "broker.local", "-p", "9000", "-u", "venus"], {});

        expect(config.mqttUrl).toBe("mqtt://broker.local");
        expect(config.monitorPort).toBe(9000);
        expect(config.mqttUsername).toBe("venus");
    });

    it("takes -c as the broker CA certificate", () => {
        const config = new Config(undefined, ["-c", "/etc/ssl/broker-ca.pem", "-q", "broker.local"], {});

        expect(config.mqttCaFile).toBe("/etc/ssl/broker-ca.pem");
        expect(config.mqttUrl).toBe("mqtt://broker.local");
    });

    it("keeps an explicit URL scheme", () => {
        const config = new Config(undefined, ["--mqtt-server", "mqtts://broker.local:8883"], {});

        expect(config.mqttUrl).toBe("mqtts://broker.local:8883");
    });

    it("reads the environment, with the command line taking precedence", () => {
        const env = { MQTT_DEVICES_PORTAL_ID: "fromenv", MQTT_DEVICES_PATH_PREFIX: "devices" };

        expect(new Config(undefined, [], env).portalId).toBe("fromenv");

        const config = new Config(undefined, ["--portal-id", "fromargs"], env);
        expect(config.portalId).toBe("fromargs");
        expect(config.pathPrefix).toBe("devices");
    });

    it("raises the log level for -v, -vv and --debug", () => {
        expect(new Config(undefined, ["-v"], {}).logLevel).toBe("debug");
        expect(new Config(undefined, ["-vv"], {}).logLevel).toBe("verbose");
        expect(new Config(undefined, ["--debug"], {}).logLevel).toBe("debug");
        expect(new Config(undefined, ["-l", "verbose", "-v"], {}).logLevel).toBe("verbose");
    });

    it("rejects an unknown log level", () => {
        expect(() => new Config(undefined, ["--log-level", "loud"], {})).toThrow();
    });

    it("loads a JSON config file below the environment", () => {
        const path = writeConfig({ monitor: { port: 9100, host: "0.0.0.0" } });

        const config = new Config(path, [], { MQTT_DEVICES_MONITOR_PORT: "9200" });

        expect(config.monitorPort).toBe(9200);
        expect(config.monitorHost).toBe("0.0.0.0");
    });

    it("rejects unknown keys in the config file", () => {
        const path = writeConfig({ mqtt: { url: "broker.local" }, bogus: 1 });

        expect(() => new Config(path, [], {})).toThrow();
    });

    it("rejects a config file that is not a JSON object", () => {
        const path = writeConfig([1, 2]);

        expect(() => new Config(path, [], {})).toThrow(`Config file must contain a JSON object: ${path}`);
    });

    it("masks the password when printed", () => {
        const config = new Config(undefined, ["-P", "test-secret"], {});

        expect(config.mqttPassword).toBe("test-secret");
        expect(config.toString()).not.toContain("test-secret");
    });

    it("finds the config file named by --config", () => {
        const path = writeConfig({ ipc: { pathPrefix: "fromfile" } });

        expect(Config.findAndLoadConfig(["--config", path]).pathPrefix).toBe("fromfile");
        expect(() => Config.findAndLoadConfig(["--config", join(dir, "missing.json")])).toThrow(
            `Config file not found: ${join(dir, "missing.json")}`
        );
    });
});
