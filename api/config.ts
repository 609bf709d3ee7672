import { z } from "zod";

const envSchema = z.object({
  PROFILE_MAX_ROWS: z.coerce.number().int().positive().default(100_000),
  PROFILE_MAX_COLUMNS: z.coerce.number().int().positive().default(500),
  PROFILE_MAX_BODY_BYTES: z.coerce.number().int().positive().default(16 * 1024 * 1024)
});

export type ProfileConfig = {
  maxRows: number;
  maxColumns: number;
  maxBodyBytes: number;
};

export const loadProfileConfig = (
  env: Record<string, string | undefined> = process.env
): ProfileConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid profile configuration: ${issues}`);
  }
  return {
    maxRows: parsed.data.PROFILE_MAX_ROWS,
    maxColumns: parsed.data.PROFILE_MAX_COLUMNS,
    maxBodyBytes: parsed.data.PROFILE_MAX_BODY_BYTES
  };
};
