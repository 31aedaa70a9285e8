export const StatusTopicFilter = "device/+/Status";
