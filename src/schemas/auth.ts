import { z } from 'zod';

const clientKeySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

// credentials.json as downloaded from Google Cloud Console
export const clientSecretsSchema = z
  .object({
    installed: clientKeySchema.optional(),
    web: clientKeySchema.optional(),
  })
  .refine(secrets => secrets.installed !== undefined || secrets.web !== undefined, {
    message: 'Expected an "installed" or "web" OAuth client',
  });

// token.json, in the format google-auth-library reads for authorized users
export const authorizedUserSchema = z.object({
  type: z.literal('authorized_user'),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
});

export type ClientKey = z.infer<typeof clientKeySchema>;
export type AuthorizedUser = z.infer<typeof authorizedUserSchema>;
