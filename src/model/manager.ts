import { z } from 'zod';

/** Database flavours the manager server can run on. */
export const SCM_DB_TYPES = ['POSTGRESQL', 'MYSQL', 'ORACLE', 'UNKNOWN'] as const;
export type ScmDbType = (typeof SCM_DB_TYPES)[number];

/** Connection information for the manager server's own database. */
export const ApiScmDbInfoSchema = z.object({
  scmDbType: z.enum(SCM_DB_TYPES),
  scmDbHost: z.string().optional(),
  scmDbPort: z.number().int().positive().optional(),
  scmDbName: z.string().optional(),
  embeddedDbUsed: z.boolean(),
});

export type ApiScmDbInfo = z.infer<typeof ApiScmDbInfoSchema>;

export const ApiVersionInfoSchema = z.object({
  version: z.string(),
  apiVersions: z.array(z.string()),
  snapshot: z.boolean(),
});

export type ApiVersionInfo = z.infer<typeof ApiVersionInfoSchema>;

export const ApiKerberosInfoSchema = z.object({
  kerberized: z.boolean(),
  kerberosRealm: z.string().optional(),
  kdcHost: z.string().optional(),
});

export type ApiKerberosInfo = z.infer<typeof ApiKerberosInfoSchema>;
