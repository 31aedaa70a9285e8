export enum LogLevel {
    Verbose = 0,
    Debug = 1,
    Log = 2,
    Error = 3,
    Silent = 4
}
