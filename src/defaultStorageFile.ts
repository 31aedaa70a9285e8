import { homedir } from "os";
import { join } from "path";

export function defaultStorageFile(): string {
    return join(homedir(), ".config", "mqtt-devices", "settings.json");
}
