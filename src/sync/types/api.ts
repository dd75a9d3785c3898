import { z } from "zod";

const storedTokenSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  expiresAt: z.string().datetime().nullable(),
});

export const tokenFileSchema = z.object({
  tokens: z
    .object({
      anilist: storedTokenSchema.optional(),
      mal: storedTokenSchema.optional(),
    })
    .default({}),
});

/** OAuth token endpoint response (authorization_code and refresh_token grants). */
export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive().optional(),
  token_type: z.string().optional(),
});

export const triggerResponseSchema = z.object({
  status: z.enum(["started", "already-running"]),
});

export type TokenFile = z.infer<typeof tokenFileSchema>;
export type TokenResponse = z.infer<typeof tokenResponseSchema>;
export type TriggerResponse = z.infer<typeof triggerResponseSchema>;
