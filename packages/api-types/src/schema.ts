import { z } from "zod";

export const contentSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({ type: z.literal("data"), data: z.record(z.unknown()) }),
]);

export const inputMessageSchema = z.object({
  id: z.string().optional(),
  object: z.literal("message").optional(),
  type: z
    .enum(["message", "function_call", "function_call_output", "reasoning"])
    .default("message"),
  role: z.enum(["user", "assistant", "system", "tool"]).optional(),
  content: z.array(contentSchema).default([]),
});

export const agentRequestSchema = z
  .object({
    input: z.array(inputMessageSchema),
    session_id: z.string().optional(),
    user_id: z.string().optional(),
    stream: z.boolean().default(true),
    tools: z.array(z.record(z.unknown())).optional(),
  })
  .passthrough();

export const deploymentModeSchema = z.enum(["daemon_thread", "detached_process", "standalone"]);

export const responseTypeSchema = z.enum(["sse", "json"]);

export type InputMessage = z.infer<typeof inputMessageSchema>;
export type AgentRequest = z.infer<typeof agentRequestSchema>;
export type AgentRequestInput = z.input<typeof agentRequestSchema>;

export type ParseResult =
  | { success: true; data: AgentRequest }
  | { success: false; issues: { path: string; message: string }[] };

export function parseAgentRequest(value: unknown): ParseResult {
  const result = agentRequestSchema.safeParse(value);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  };
}
