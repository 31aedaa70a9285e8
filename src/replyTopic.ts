export function replyTopic(clientId: string): string {
    return `device/${clientId}/DeviceInstance`;
}
