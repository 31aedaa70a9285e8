import { serviceCatalog } from "./serviceCatalog";
import type { KnownServiceType } from "./serviceCatalog";

export function isKnownServiceType(name: string): name is KnownServiceType {
    return Object.hasOwn(serviceCatalog, name);
}
