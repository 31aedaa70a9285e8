export interface ServiceDefinition {
    productName: string;
    /** Readings a device may publish; each starts out unknown. */
    attributes: readonly string[];
}
