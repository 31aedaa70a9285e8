export class BusPublishError extends Error {
    override name = "BusPublishError";

    constructor(
        message: string,
        readonly clientId: string,
        readonly topic: string,
        options?: ErrorOptions
    ) {
        super(message, options);
    }
}
