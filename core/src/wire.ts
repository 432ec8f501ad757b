/**
 * Hook tool request/response wire envelope (socket runner).
 *
 * A request names the tool and its arguments exactly as they would appear on
 * a command line; the reply carries what the tool would have written to
 * stdout and stderr, plus its exit code.
 */

import { z } from "zod";

export type ToolRequest = {
  /** Value of JUJU_CONTEXT_ID for the running hook */
  contextId: string;
  /** Working directory the tool runs in (the charm directory) */
  dir: string;
  commandName: string;
  args: string[];
  /** Base64-encoded stdin, when the tool reads from it */
  stdin?: string;
};

export const ToolResultSchema = z.object({
  code: z.number().int(),
  /** Base64-encoded standard output */
  stdout: z.string().default(""),
  /** Base64-encoded standard error */
  stderr: z.string().default(""),
});

export type ToolResult = z.infer<typeof ToolResultSchema>;

export const ToolResponseSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), result: ToolResultSchema }),
  z.object({
    ok: z.literal(false),
    error: z.object({
      code: z.string().optional(),
      message: z.string(),
    }),
  }),
]);

export type ToolResponse = z.infer<typeof ToolResponseSchema>;
