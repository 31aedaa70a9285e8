/** serviceKey -> service type name, as declared by a device */
export type ServiceMap = Record<string, string>;
