import { z } from "zod";

export const ServiceParamsSchema = z.object({
    serviceType: z.string().min(1),
    deviceInstance: z.coerce.number().int().nonnegative()
});
