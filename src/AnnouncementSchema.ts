import { z } from "zod";

// `services` is only looked at for connected=1, see ServiceMapSchema
export const AnnouncementSchema = z.object({
    clientid: z.string().min(1),
    connected: z.union([z.literal(0), z.literal(1), z.boolean()]),
    services: z.unknown().optional()
});
