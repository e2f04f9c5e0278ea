import { z } from "zod";

const argv = z.array(z.string().min(1)).min(1);

export const configSchema = z.object({
  manifest: z.object({
    path: z.string().default("manifest.json"),
  }),
  state: z.object({
    path: z.string().default(".labfleet/state.json"),
    healthDbPath: z.string().default(".labfleet/health.db"),
  }),
  execution: z.object({
    parallelism: z.number().int().min(1).max(32).default(1),
    retryAttempts: z.number().int().min(1).max(20).default(3),
    retryDelayMs: z.number().int().min(0).max(600_000).default(10_000),
    maxRetryDelayMs: z.number().int().min(0).max(3_600_000).default(120_000),
    backoff: z.enum(["fixed", "exponential"]).default("fixed"),
  }),
  health: z.object({
    interval: z.number().nonnegative().default(30),
    timeout: z.number().nonnegative().default(300),
    retries: z.number().int().min(1).default(3),
    shell: z.string().default("/bin/sh"),
    // Prepended to command probes, "{host}" is replaced by the service address
    commandPrefix: z.array(z.string()).default([]),
  }),
  collaborators: z.object({
    provision: argv.optional(),
    configure: argv.optional(),
    identity: argv.optional(),
    fatalExitCodes: z.array(z.number().int().min(1).max(255)).default([65, 77]),
    timeoutMs: z.number().int().min(1000).default(600_000),
  }),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): Config {
  return configSchema.parse(raw);
}
