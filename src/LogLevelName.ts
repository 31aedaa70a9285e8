export type LogLevelName = "silent" | "error" | "log" | "debug" | "verbose";
