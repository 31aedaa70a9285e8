/** MQTT topic filter matching with `+` and `#` wildcards. */
export function topicMatches(filter: string, topic: string): boolean {
    const filterParts = filter.split("/");
    const topicParts = topic.split("/");

    for (let i = 0; i < filterParts.length; ++i) {
        const part = filterParts[i];
        if (part === "#") {
            return true;
        }
        if (i >= topicParts.length) {
            return false;
        }
        if (part !== "+" && part !== topicParts[i]) {
            return false;
        }
    }
    return filterParts.length === topicParts.length;
}
