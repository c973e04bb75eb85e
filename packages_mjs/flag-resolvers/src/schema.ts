import { z } from 'zod';
import type { JsonMapping, JsonValue } from '@flagwork/cli-grammar';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema)
    ])
);

/** A decoded document is always a mapping at the top level. */
export const DocumentSchema: z.ZodType<JsonMapping> = z.record(JsonValueSchema);
