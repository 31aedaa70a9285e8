import { z } from "zod";

export const SettingsFileSchema = z.record(z.string(), z.unknown());
