import { z } from "zod";
import { InvalidArgumentError } from "../core/errors.js";

export const DEFAULT_ENDPOINT = "oss-cn-shenzhen.aliyuncs.com";
export const DEFAULT_MAX_KEYS = 100;
export const DEFAULT_ACCESS_TIMEOUT = 60;

function requiredString(field: string) {
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} is required`);
}

function withScheme(endpoint: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(endpoint) ? endpoint : `https://${endpoint}`;
}

// oss-cn-hangzhou.aliyuncs.com -> oss-cn-hangzhou
function regionFromEndpoint(endpoint: string): string {
  const host = new URL(endpoint).hostname;
  const label = host.split(".")[0] ?? "";
  return label.startsWith("oss-") ? label : "auto";
}

const schema = z
  .object({
    driver: z.literal("oss").default("oss"),
    accessKeyId: requiredString("accessKeyId"),
    accessKeySecret: requiredString("accessKeySecret"),
    bucket: requiredString("bucket"),
    endpoint: z
      .string()
      .trim()
      .optional()
      .transform((value) => withScheme(value ? value : DEFAULT_ENDPOINT))
      .refine((value) => URL.canParse(value), "endpoint must be a host name or URL"),
    region: z
      .string()
      .trim()
      .optional()
      .transform((value) => (value ? value : undefined)),
    maxKeys: z.coerce.number().int().min(1).max(1000).default(DEFAULT_MAX_KEYS),
    accessTimeout: z.coerce.number().int().positive().default(DEFAULT_ACCESS_TIMEOUT),
    requestTimeout: z.coerce.number().int().positive().optional(),
    forcePathStyle: z.boolean().default(false)
  })
  .transform((config) => ({
    ...config,
    region: config.region ?? regionFromEndpoint(config.endpoint)
  }));

export type DiskConfig = z.output<typeof schema>;
export type DiskConfigInput = z.input<typeof schema>;

export function parseDiskConfig(input: unknown): DiskConfig {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new InvalidArgumentError(`Invalid object storage disk configuration: ${message}`);
  }

  return parsed.data;
}
