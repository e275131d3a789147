import { z } from 'zod';

export const HostIdentity = z.object({
  /** FQDN when the OS reports one, otherwise the short hostname */
  hostname: z.string().min(1),
  /** Source address of the default outbound route; absent when undetected */
  primaryIpv4: z.string().ip({ version: 'v4' }).optional(),
});
export type HostIdentity = z.infer<typeof HostIdentity>;
