import { getLogFile } from "./logFile";

export function closeLogger(): void {
    getLogFile()?.end();
}
