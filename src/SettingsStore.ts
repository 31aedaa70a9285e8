/**
 * Durable key/value storage. Each `set` is atomic for its key and survives
 * a restart; failures reject.
 */
export interface SettingsStore {
    get(key: string): Promise<unknown>;
    set(key: string, value: unknown): Promise<void>;
}
