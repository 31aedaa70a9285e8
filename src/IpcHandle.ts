export interface IpcHandle {
    readonly id: number;
    readonly path: string;
}
