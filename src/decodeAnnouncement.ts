import { AnnouncementSchema } from "./AnnouncementSchema";
import { MalformedAnnouncementError } from "./MalformedAnnouncementError";
import { ServiceMapSchema } from "./ServiceMapSchema";
import { clientIdFromStatusTopic } from "./clientIdFromStatusTopic";
import { describeZodError } from "./describeZodError";
import type { Announcement } from "./Announcement";
import type { AnnouncementEvent } from "./AnnouncementEvent";

/**
 * Turns one status message into exactly one event.
 *
 * A disconnect never looks at `services`: whatever the payload declares,
 * every service of the client goes away.
 *
 * @throws MalformedAnnouncementError for anything that is not a valid status message
 */
export function decodeAnnouncement(topic: string, payload: Buffer | string): AnnouncementEvent {
    const topicClientId = clientIdFromStatusTopic(topic);
    if (topicClientId === null) {
        throw new MalformedAnnouncementError(`Not a status topic: ${topic}`, topic);
    }

    const text = typeof payload === "string" ? payload : payload.toString("utf-8");
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (err) {
        throw new MalformedAnnouncementError(`Status payload on ${topic} is not JSON`, topic, { cause: err });
    }

    const announcement = AnnouncementSchema.safeParse(data);
    if (!announcement.success) {
        throw new MalformedAnnouncementError(
            `Invalid status payload on ${topic}: ${describeZodError(announcement.error)}`,
            topic
        );
    }

    const { clientid, connected, services }: Announcement = announcement.data;
    if (clientid !== topicClientId) {
        throw new MalformedAnnouncementError(
            `Status payload clientid '${clientid}' does not match topic ${topic}`,
            topic
        );
    }

    if (connected === 0 || connected === false) {
        return { type: "disconnect", clientId: clientid };
    }

    const serviceMap = ServiceMapSchema.safeParse(services);
    if (!serviceMap.success) {
        throw new MalformedAnnouncementError(
            `Invalid services on ${topic}: ${describeZodError(serviceMap.error)}`,
            topic
        );
    }

    return { type: "connect", clientId: clientid, services: serviceMap.data };
}
