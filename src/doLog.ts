import { format } from "util";
import { getConsoleLevel } from "./consoleLevel";
import { getLogFile } from "./logFile";
import type { LogLevel } from "./LogLevel";

function formatMessage(level: string, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const message = format(...args);
    return `[${timestamp}] [${level}] ${message}`;
}

export function doLog(
    level: LogLevel,
    levelName: string,
    consoleMethod: (...args: unknown[]) => void,
    ...args: unknown[]
): void {
    // The log file gets everything, the console only what passes the level
    const logFile = getLogFile();
    if (logFile) {
        logFile.write(formatMessage(levelName, args) + "\n");
    }

    if (level >= getConsoleLevel()) {
        consoleMethod(...args);
    }
}
