export interface ServiceSummary {
    serviceKey: string;
    serviceType: string;
    deviceInstance: number;
    path: string;
    telemetryTopics: string[];
}
