import { z } from "zod";

export const CustomNameBodySchema = z.object({
    name: z.string().trim().max(64)
});
