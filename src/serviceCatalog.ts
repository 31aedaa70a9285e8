import type { ServiceDefinition } from "./ServiceDefinition";

/**
 * Service types devices can announce. Adding a type is adding an entry;
 * anything not listed is exposed as genericServiceDefinition.
 */
export const serviceCatalog = {
    temperature: {
        productName: "Temperature sensor",
        attributes: ["Temperature", "Pressure", "Humidity"]
    },
    tank: {
        productName: "Tank sensor",
        attributes: ["Level", "Remaining", "Capacity", "FluidType"]
    }
} as const satisfies Record<string, ServiceDefinition>;

export type KnownServiceType = keyof typeof serviceCatalog;

export const genericServiceDefinition: ServiceDefinition = {
    productName: "Generic device",
    attributes: []
};
