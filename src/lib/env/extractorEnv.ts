import { z } from "zod";

const ExtractorEnvSchema = z.object({
  // Parallel PDF/text writes after the scan
  TLF_WRITE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),

  // Overrides the level implied by --verbose
  TLF_LOG_LEVEL: z.enum(["info", "warn", "error"]).optional(),
});

export type ExtractorEnv = z.infer<typeof ExtractorEnvSchema>;

export function extractorEnv(source: NodeJS.ProcessEnv = process.env): ExtractorEnv {
  const parsed = ExtractorEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid extractor env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid extractor environment variables (see logs).");
  }
  return parsed.data;
}
