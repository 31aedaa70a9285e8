import type { LogLevelName } from "./LogLevelName";

export interface ConfigType {
    mqtt: {
        url: string;
        username: string | null;
        password: string | null;
        caFile: string | null;
        clientId: string | null;
    };
    storage: {
        file: string;
    };
    ipc: {
        pathPrefix: string;
        portalId: string | null;
    };
    monitor: {
        enabled: boolean;
        host: string;
        port: number;
    };
    logging: {
        level: LogLevelName;
        file: string | null;
    };
}
