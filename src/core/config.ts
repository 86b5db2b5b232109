import { z } from "zod";

export const DEFAULT_HEAD_IMAGE = "nextflow/nextflow:latest";
export const DEFAULT_HEAD_COMMAND = "nextflow";

const HeadSchema = z
  .object({
    image: z.string().min(1).optional(),
    // Legacy alias for `image`; resolved by the loader.
    pod_image: z.string().min(1).optional(),
    cpus: z.number().int().positive().optional(),
    memory: z.string().min(1).optional(),
    prescript: z.string().min(1).optional(),
    command: z.string().min(1).default(DEFAULT_HEAD_COMMAND),
    env: z.record(z.string()).default({}),
  })
  .strict();

const HistorySchema = z
  .object({
    enabled: z.boolean().default(true),
  })
  .strict();

const DriverSchema = z
  .object({
    poll_interval_ms: z.number().int().nonnegative().default(2000),
    start_timeout_seconds: z.number().int().positive().default(600),
  })
  .strict();

export const LauncherConfigSchema = z
  .object({
    namespace: z.string().min(1).optional(),
    service_account: z.string().min(1).optional(),
    volume_mounts: z.array(z.string().min(1)).default([]),
    head: HeadSchema.default({}),
    history: HistorySchema.default({}),
    driver: DriverSchema.default({}),
  })
  .strict();

export type ParsedLauncherConfig = z.infer<typeof LauncherConfigSchema>;

export type HeadConfig = Omit<ParsedLauncherConfig["head"], "image" | "pod_image"> & {
  image: string;
};

export type LauncherConfig = Omit<ParsedLauncherConfig, "head"> & {
  head: HeadConfig;
};

export function resolveLauncherConfig(
  parsed: ParsedLauncherConfig,
  image: string | undefined,
): LauncherConfig {
  const { cpus, memory, prescript, command, env } = parsed.head;
  return {
    ...parsed,
    head: { cpus, memory, prescript, command, env, image: image ?? DEFAULT_HEAD_IMAGE },
  };
}
