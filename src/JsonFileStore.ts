import { SettingsFileSchema } from "./SettingsFileSchema";
import { describeZodError } from "./describeZodError";
import { dirname } from "path";
import { isENOENT } from "./isENOENT";
import { mkdir, open, readFile, rename } from "fs/promises";
import { verbose } from "./verbose";
import { warn } from "./warn";
import type { SettingsStore } from "./SettingsStore";

type Settings = Record<string, unknown>;

/**
 * Settings kept as one JSON object in a file. Every write is synced to
 * `<path>.bak` first, then replaces the file through a synced temporary
 * file and a rename. Writes are applied one after another. A settings file
 * that cannot be parsed is recovered from the backup.
 */
export class JsonFileStore implements SettingsStore {
    #path: string;
    #data: Settings | undefined;
    #writes: Promise<void> = Promise.resolve();

    constructor(path: string) {
        this.#path = path;
    }

    get path(): string {
        return this.#path;
    }

    get backupPath(): string {
        return `${this.#path}.bak`;
    }

    async get(key: string): Promise<unknown> {
        const data = await this.#load();
        return Object.hasOwn(data, key) ? data[key] : undefined;
    }

    set(key: string, value: unknown): Promise<void> {
        const write = this.#writes.then(async () => {
            const next = { ...(await this.#load()), [key]: value };
            await this.#persist(next);
            this.#data = next;
        });
        // The caller gets the rejection; the queue itself keeps going.
        this.#writes = write.then(
            () => undefined,
            () => undefined
        );
        return write;
    }

    async #load(): Promise<Settings> {
        if (this.#data) {
            return this.#data;
        }

        let data: Settings | undefined;
        try {
            data = await JsonFileStore.#read(this.#path);
        } catch (err) {
            data = await this.#recover(err);
        }
        if (data === undefined) {
            data = await JsonFileStore.#read(this.backupPath);
        }
        if (data === undefined) {
            verbose(`Settings file ${this.#path} does not exist yet`);
        }
        this.#data = data ?? {};
        return this.#data;
    }

    async #recover(cause: unknown): Promise<Settings> {
        let backup: Settings | undefined;
        try {
            backup = await JsonFileStore.#read(this.backupPath);
        } catch (err) {
            verbose(`Settings backup ${this.backupPath} is unusable:`, err);
        }
        if (backup === undefined) {
            throw cause;
        }
        warn(`Settings file ${this.#path} is unreadable, using ${this.backupPath}:`, cause);
        return backup;
    }

    async #persist(data: Settings): Promise<void> {
        await mkdir(dirname(this.#path), { recursive: true });
        const text = JSON.stringify(data, null, 4) + "\n";
        await JsonFileStore.#writeSynced(this.backupPath, text);
        const tempPath = `${this.#path}.${process.pid}.tmp`;
        await JsonFileStore.#writeSynced(tempPath, text);
        await rename(tempPath, this.#path);
    }

    /** undefined when the file does not exist */
    static async #read(path: string): Promise<Settings | undefined> {
        let text: string;
        try {
            text = await readFile(path, "utf8");
        } catch (err) {
            if (isENOENT(err)) {
                return undefined;
            }
            throw err;
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (err) {
            throw new Error(`Settings file ${path} is not JSON`, { cause: err });
        }
        const parsed = SettingsFileSchema.safeParse(json);
        if (!parsed.success) {
            throw new Error(`Settings file ${path} is invalid: ${describeZodError(parsed.error)}`);
        }
        return parsed.data;
    }

    static async #writeSynced(path: string, text: string): Promise<void> {
        const handle = await open(path, "w");
        try {
            await handle.writeFile(text, "utf8");
            await handle.sync();
        } finally {
            await handle.close();
        }
    }
}
