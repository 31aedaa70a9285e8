import { createConfigSchema } from "./configSchema";
import { debug } from "./debug";
import { error } from "./error";
import { existsSync, readFileSync } from "fs";
import { expandShortOptions } from "./expandShortOptions";
import { homedir } from "os";
import { parseCommandLine } from "./parseCommandLine";
import path from "path";
import type { ConfigType } from "./ConfigType";
import type { LogLevelName } from "./LogLevelName";
import type convict from "convict";

const verbosity: LogLevelName[] = ["silent", "error", "log", "debug", "verbose"];

export class Config {
    #convictConfig: convict.Config<ConfigType>;

    constructor(configPath?: string, cliArgs: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env) {
        this.#convictConfig = createConfigSchema({ args: expandShortOptions(cliArgs), env });
        this.#loadConfig(configPath);
        this.#applyVerbosity(cliArgs);
        this.#validate();
    }

    // MQTT
    get mqttUrl(): string {
        const url = this.#convictConfig.get("mqtt.url");
        return url.includes("://") ? url : `mqtt://${url}`;
    }

    get mqttUsername(): string | null {
        return this.#convictConfig.get("mqtt.username");
    }

    get mqttPassword(): string | null {
        return this.#convictConfig.get("mqtt.password");
    }

    get mqttCaFile(): string | null {
        return this.#convictConfig.get("mqtt.caFile");
    }

    get mqttClientId(): string {
        return this.#convictConfig.get("mqtt.clientId") || `mqtt-devices-${process.pid}`;
    }

    // Storage
    get storageFile(): string {
        return this.#convictConfig.get("storage.file");
    }

    // IPC bus
    get pathPrefix(): string {
        return this.#convictConfig.get("ipc.pathPrefix");
    }

    get portalId(): string | null {
        return this.#convictConfig.get("ipc.portalId");
    }

    // Monitor
    get monitorEnabled(): boolean {
        return this.#convictConfig.get("monitor.enabled");
    }

    get monitorHost(): string {
        return this.#convictConfig.get("monitor.host");
    }

    get monitorPort(): number {
        return this.#convictConfig.get("monitor.port");
    }

    // Logging
    get logLevel(): LogLevelName {
        return this.#convictConfig.get("logging.level");
    }

    get logFile(): string | null {
        return this.#convictConfig.get("logging.file");
    }

    getAll(): ConfigType {
        return this.#convictConfig.getProperties();
    }

    // Sensitive values are masked
    toString(): string {
        return this.#convictConfig.toString();
    }

    static getDefaultConfigPaths(): string[] {
        return [
            path.join(process.cwd(), "mqtt-devices.json"),
            path.join(process.cwd(), ".mqtt-devicesrc"),
            path.join(homedir(), ".config", "mqtt-devices", "config.json")
        ];
    }

    /** Uses --config when given, otherwise the first default path that exists. */
    static findAndLoadConfig(cliArgs: string[] = process.argv.slice(2)): Config {
        const commandLine = parseCommandLine(cliArgs);
        if (commandLine.config) {
            debug(`Using config file from CLI: ${commandLine.config}`);
            if (!existsSync(commandLine.config)) {
                throw new Error(`Config file not found: ${commandLine.config}`);
            }
            return new Config(commandLine.config, cliArgs);
        }

        for (const configPath of Config.getDefaultConfigPaths()) {
            if (existsSync(configPath)) {
                debug(`Found config file: ${configPath}`);
                return new Config(configPath, cliArgs);
            }
        }

        debug("No config file found, using defaults");
        return new Config(undefined, cliArgs);
    }

    #loadConfig(configPath?: string): void {
        if (!configPath) {
            return;
        }

        let configData: unknown;
        try {
            configData = JSON.parse(readFileSync(configPath, "utf8"));
        } catch (err) {
            error(`Failed to load config file: ${configPath}`, err);
            throw new Error(`Config loading failed: ${configPath}`, { cause: err });
        }

        if (typeof configData !== "object" || configData === null || Array.isArray(configData)) {
            throw new Error(`Config file must contain a JSON object: ${configPath}`);
        }
        this.#convictConfig.load(configData);
        debug(`Loaded config from: ${configPath}`);
    }

    // -v/-vv and --debug only ever raise the log level
    #applyVerbosity(cliArgs: string[]): void {
        const commandLine = parseCommandLine(cliArgs);
        let wanted: LogLevelName | undefined;
        if (commandLine.verbose >= 2) {
            wanted = "verbose";
        } else if (commandLine.verbose === 1 || commandLine.debug) {
            wanted = "debug";
        }

        if (wanted && verbosity.indexOf(wanted) > verbosity.indexOf(this.logLevel)) {
            this.#convictConfig.set("logging.level", wanted);
            debug(`CLI override: log-level = ${wanted}`);
        }
    }

    #validate(): void {
        try {
            this.#convictConfig.validate({ allowed: "strict" });
        } catch (err) {
            error("Config validation failed:", err);
            throw err;
        }
    }
}
