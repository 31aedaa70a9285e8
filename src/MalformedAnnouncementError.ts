/**
 * A status message that cannot be turned into a Connect or Disconnect
 * event. The message is dropped and nothing changes.
 */
export class MalformedAnnouncementError extends Error {
    override name = "MalformedAnnouncementError";

    constructor(
        message: string,
        readonly topic: string,
        options?: ErrorOptions
    ) {
        super(message, options);
    }
}
