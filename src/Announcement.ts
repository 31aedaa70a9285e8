import type { AnnouncementSchema } from "./AnnouncementSchema";
import type { z } from "zod";

export type Announcement = z.infer<typeof AnnouncementSchema>;
