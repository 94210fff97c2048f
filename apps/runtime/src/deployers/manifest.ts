import fs from "node:fs";
import { z } from "zod";
import { responseTypeSchema } from "@agentrun/api-types";

/** Everything a detached service process needs to rebuild its runner and serve it. */
export const manifestSchema = z.object({
  agentModule: z.string().min(1),
  serviceName: z.string(),
  host: z.string(),
  port: z.number().int().min(0).max(65535),
  endpointPath: z.string().startsWith("/"),
  responseType: responseTypeSchema,
  shutdownTimeoutMs: z.number().int().positive(),
  requirements: z.array(z.string()).default([]),
  extraPackages: z.array(z.string()).default([]),
});

export type DetachedManifest = z.infer<typeof manifestSchema>;

export const MANIFEST_FILE = "agentrun.json";

export function readManifest(manifestPath: string): DetachedManifest {
  const raw: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid manifest ${manifestPath}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown error"}`,
    );
  }
  return parsed.data;
}
