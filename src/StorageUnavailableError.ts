/**
 * The settings store could not be read or could not commit a write. A
 * Connect event that hits this is abandoned before anything is exposed or
 * announced; the device retries on its own.
 */
export class StorageUnavailableError extends Error {
    override name = "StorageUnavailableError";

    constructor(
        message: string,
        readonly clientId: string | null,
        options?: ErrorOptions
    ) {
        super(message, options);
    }
}
