import { z } from "zod";

const EnvSchema = z.object({
  COACH_GOLF_ROSTER: z.string().trim().min(1).default("roster.json"),
  COACH_GOLF_OUT_DIR: z.string().trim().min(1).default("./out"),
  COACH_GOLF_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse({
    COACH_GOLF_ROSTER: source.COACH_GOLF_ROSTER || undefined,
    COACH_GOLF_OUT_DIR: source.COACH_GOLF_OUT_DIR || undefined,
    COACH_GOLF_LOG_LEVEL: source.COACH_GOLF_LOG_LEVEL?.toLowerCase() || undefined,
  });
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(`Invalid env variable ${first?.path.join(".") ?? "?"}: ${first?.message ?? "invalid"}`);
  }
  return parsed.data;
}
