import { z } from "zod";

/** Persisted form of one service type's allocations: "<clientId>/<serviceKey>" -> device instance. */
export const InstanceTableSchema = z.record(z.string(), z.number().int().nonnegative());
