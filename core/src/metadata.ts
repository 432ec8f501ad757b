/**
 * Declarations that modules register alongside their hooks.
 *
 * These are what the charm packaging tool reads back from the registry to
 * write the charm's metadata and config files; at hook time the relation
 * names also decide which relations the context fetches.
 */

import { z } from "zod";

// ── Relations ───────────────────────────────────────────────────────

export const RelationRoleSchema = z.enum(["provider", "requirer", "peer"]);
export type RelationRole = z.infer<typeof RelationRoleSchema>;

export const RelationScopeSchema = z.enum(["global", "container"]);
export type RelationScope = z.infer<typeof RelationScopeSchema>;

export const RelationDeclarationSchema = z.object({
  name: z.string().min(1),
  role: RelationRoleSchema,
  /** Interface name both ends of the relation must agree on */
  interface: z.string().min(1),
  /** Maximum number of relation instances (0 or absent means unlimited) */
  limit: z.number().int().nonnegative().optional(),
  optional: z.boolean().optional(),
  scope: RelationScopeSchema.optional(),
});

export type RelationDeclaration = z.infer<typeof RelationDeclarationSchema>;

// ── Resources ───────────────────────────────────────────────────────

export const ResourceDeclarationSchema = z.object({
  name: z.string().min(1),
  type: z.enum(["file", "oci-image"]),
  /** Filename the resource is stored under (file resources) */
  path: z.string().optional(),
  description: z.string().optional(),
});

export type ResourceDeclaration = z.infer<typeof ResourceDeclarationSchema>;

// ── Config options ──────────────────────────────────────────────────

export const ConfigOptionSchema = z
  .object({
    type: z.enum(["string", "int", "float", "boolean"]),
    description: z.string().optional(),
    default: z.union([z.string(), z.number(), z.boolean()]).optional(),
  })
  .superRefine((opt, ctx) => {
    if (opt.default === undefined) return;
    const ok =
      (opt.type === "string" && typeof opt.default === "string") ||
      (opt.type === "boolean" && typeof opt.default === "boolean") ||
      (opt.type === "float" && typeof opt.default === "number") ||
      (opt.type === "int" && typeof opt.default === "number" && Number.isInteger(opt.default));
    if (!ok) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `default does not match option type ${opt.type}`,
        path: ["default"],
      });
    }
  });

export type ConfigOption = z.infer<typeof ConfigOptionSchema>;
