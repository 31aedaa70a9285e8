import type { ServiceSummary } from "./ServiceSummary";

export interface ClientSummary {
    clientId: string;
    services: ServiceSummary[];
}
