import { z } from "zod";

export const IdentitySchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional().describe("Display name used in the From header"),
    email: z
      .string()
      .optional()
      .refine((value) => !value?.trim() || value.includes("@"), {
        message: "email must contain @",
      })
      .describe("Address this identity answers for exactly"),
    catchAll: z
      .string()
      .optional()
      .describe("Wildcard address pattern, e.g. *@example.com. Empty = disabled."),
  })
  .strict();

export const IdentitySettingsSchema = z
  .object({
    identities: z.array(IdentitySchema),
    headerPriority: z
      .array(z.string().trim().min(1))
      .optional()
      .describe("Headers searched for recipient addresses, highest priority first"),
    useFallbackDefault: z.boolean().optional(),
    defaultIdentityId: z.string().optional(),
  })
  .strict()
  .superRefine((settings, ctx) => {
    const seen = new Set<string>();
    settings.identities.forEach((identity, index) => {
      if (seen.has(identity.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["identities", index, "id"],
          message: `duplicate identity id "${identity.id}"`,
        });
      }
      seen.add(identity.id);
    });
    if (settings.defaultIdentityId !== undefined && !seen.has(settings.defaultIdentityId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["defaultIdentityId"],
        message: `unknown identity "${settings.defaultIdentityId}"`,
      });
    }
  });

export type ConfiguredIdentity = z.infer<typeof IdentitySchema>;
