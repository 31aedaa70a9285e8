/** Returns the client id of a `device/<clientId>/Status` topic, or null for any other topic. */
export function clientIdFromStatusTopic(topic: string): string | null {
    const parts = topic.split("/");
    if (parts.length !== 3 || parts[0] !== "device" || parts[2] !== "Status" || parts[1].length === 0) {
        return null;
    }
    return parts[1];
}
