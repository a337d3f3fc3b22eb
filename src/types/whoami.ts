import { z } from 'zod';

/**
 * Caller and project metadata returned by `GET /actions/whoami`.
 * `projectName` takes part in every index URL.
 */
export interface ClientInfo {
  projectName: string;
  userLabel?: string;
  userName?: string;
}

export const ClientInfoSchema: z.ZodType<ClientInfo, z.ZodTypeDef, unknown> = z
  .object({
    project_name: z.string().min(1),
    user_label: z.string().optional(),
    user_name: z.string().optional(),
  })
  .transform((body) => ({
    projectName: body.project_name,
    userLabel: body.user_label,
    userName: body.user_name,
  }));

export const IndexListSchema: z.ZodType<string[], z.ZodTypeDef, unknown> = z.array(z.string());
