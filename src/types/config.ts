import { z } from "zod";

/** Full server configuration, validated after merging the YAML file over defaults. */
export const reconcilerConfigSchema = z.object({
  slapt_get: z.object({
    path: z.string().min(1),
    global_flags: z.array(z.string().min(1)),
    environment: z.record(z.string()),
  }),
  errors: z.object({
    // Seconds; 0 waits for slapt-get however long it takes.
    command_timeout_ceiling: z.number().int().min(0),
  }),
  output: z.object({
    max_buffer_mb: z.number().positive(),
  }),
});

export type ReconcilerConfig = z.infer<typeof reconcilerConfigSchema>;
