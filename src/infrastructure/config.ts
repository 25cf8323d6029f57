import { z } from 'zod';

const DEFAULT_PREFIX = 'text-anomaly';

/** Lifetime of the report download link. Not configurable. */
export const ACCESS_LINK_TTL_MS = 60 * 60 * 1000;

// `KEY=` in a .env file arrives as '', which z.coerce.number() would read as 0
const emptyAsUnset = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  PORT: z.preprocess(emptyAsUnset, z.coerce.number().int().positive().default(3000)),
  OCI_AUTH: z.enum(['resource_principal', 'config_file']).default('resource_principal'),
  OCI_CONFIG_FILE: z.string().min(1).optional(),
  OCI_PROFILE: z.string().min(1).optional(),
  OCI_COMPARTMENT_ID: z.string().min(1, 'OCI_COMPARTMENT_ID is required'),
  OCI_NAMESPACE: z.string().min(1, 'OCI_NAMESPACE is required'),
  OCI_BUCKET_NAME: z.string().min(1, 'OCI_BUCKET_NAME is required'),
  OBJECT_KEY_PREFIX: z
    .string()
    .min(1)
    .transform((value) => value.replace(/\/+$/, ''))
    .default(DEFAULT_PREFIX),
  DOCGEN_FUNCTION_ID: z.string().min(1, 'DOCGEN_FUNCTION_ID is required'),
  DOCGEN_INVOKE_ENDPOINT: z.string().url('DOCGEN_INVOKE_ENDPOINT must be a URL'),
  REPORT_TEMPLATE_OBJECT: z.string().min(1).optional(),
  REPORT_FONTS_OBJECT: z.string().min(1).optional(),
  CONFIDENCE_THRESHOLD: z.preprocess(emptyAsUnset, z.coerce.number().min(0).max(1).default(0.9)),
});

export interface AppConfig {
  readonly port: number;
  readonly auth:
    | { readonly mode: 'resource_principal' }
    | { readonly mode: 'config_file'; readonly configFile?: string; readonly profile?: string };
  readonly compartmentId: string;
  readonly storage: {
    readonly namespace: string;
    readonly bucket: string;
    readonly prefix: string;
  };
  readonly documentGenerator: {
    readonly functionId: string;
    readonly invokeEndpoint: string;
    readonly templateObject: string;
    readonly fontsObject?: string;
  };
  readonly confidenceThreshold: number;
}

/** @throws {Error} If a required variable is missing or a value is malformed */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  const config: AppConfig = {
    port: e.PORT,
    auth:
      e.OCI_AUTH === 'config_file'
        ? { mode: 'config_file', configFile: e.OCI_CONFIG_FILE, profile: e.OCI_PROFILE }
        : { mode: 'resource_principal' },
    compartmentId: e.OCI_COMPARTMENT_ID,
    storage: Object.freeze({
      namespace: e.OCI_NAMESPACE,
      bucket: e.OCI_BUCKET_NAME,
      prefix: e.OBJECT_KEY_PREFIX,
    }),
    documentGenerator: Object.freeze({
      functionId: e.DOCGEN_FUNCTION_ID,
      invokeEndpoint: e.DOCGEN_INVOKE_ENDPOINT,
      templateObject: e.REPORT_TEMPLATE_OBJECT ?? `${e.OBJECT_KEY_PREFIX}/TextAnomalyTemplate.docx`,
      ...(e.REPORT_FONTS_OBJECT !== undefined && { fontsObject: e.REPORT_FONTS_OBJECT }),
    }),
    confidenceThreshold: e.CONFIDENCE_THRESHOLD,
  };

  return Object.freeze(config);
}
