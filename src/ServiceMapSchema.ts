import { z } from "zod";

export const ServiceMapSchema = z
    .record(z.string().min(1), z.string().min(1))
    .refine((services: Record<string, string>) => Object.keys(services).length > 0, {
        message: "must declare at least one service"
    });
