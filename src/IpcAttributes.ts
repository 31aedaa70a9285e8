import type { IpcValue } from "./IpcValue";

export type IpcAttributes = Record<string, IpcValue>;
