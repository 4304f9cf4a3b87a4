import { z, ZodError } from 'zod';
import { isIP } from 'node:net';
import {
  DEFAULT_BROADCAST_ADDRESS,
  DEFAULT_MONITOR_PORT,
  FieldValidation,
  RegistryDocument,
  StoredServer,
} from '../types';
import { BOOT_HISTORY_LIMIT } from '../services/bootTimeEstimator';

/**
 * MAC address validation pattern
 * Accepts XX:XX:XX:XX:XX:XX or XX-XX-XX-XX-XX-XX, one separator throughout
 */
export const MAC_ADDRESS_PATTERN = /^[0-9A-Fa-f]{2}([:-])[0-9A-Fa-f]{2}(?:\1[0-9A-Fa-f]{2}){4}$/;
const MAC_ADDRESS_MESSAGE = 'MAC address must be in format XX:XX:XX:XX:XX:XX or XX-XX-XX-XX-XX-XX';

const REDIRECT_URL_MESSAGE = 'Redirect URL must be a valid http or https URL';

const URL_SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

export const LEGACY_SERVER_NAME = 'Default Server';

const portSchema = (label: string) =>
  z.coerce
    .number({ invalid_type_error: `${label} must be an integer` })
    .int(`${label} must be an integer`)
    .min(1, `${label} must be between 1 and 65535`)
    .max(65_535, `${label} must be between 1 and 65535`);

const waitSecondsSchema = z.coerce
  .number({ invalid_type_error: 'Wait time must be an integer' })
  .int('Wait time must be an integer')
  .positive('Wait time must be greater than zero');

const macSchema = z.string().trim().regex(MAC_ADDRESS_PATTERN, MAC_ADDRESS_MESSAGE);

const broadcastSchema = z
  .string()
  .trim()
  .min(1, 'Broadcast address is required')
  .refine((value) => isIP(value) === 4, { message: 'Broadcast address must be an IPv4 address' });

const urlSchema = z
  .string()
  .trim()
  .min(1, 'Redirect URL is required')
  .max(2_048, 'Redirect URL must not exceed 2048 characters')
  .transform((value, ctx) => {
    const normalized = normalizeRedirectUrl(value);
    if (normalized === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: REDIRECT_URL_MESSAGE });
      return z.NEVER;
    }
    return normalized;
  });

const monitorAddressSchema = z
  .string()
  .trim()
  .max(253, 'Monitor address must not exceed 253 characters')
  .optional()
  .transform((value) => (value ? value : undefined));

// Hand-edited documents may carry more samples than the estimator keeps
const bootHistorySchema = z
  .array(z.coerce.number().int().nonnegative())
  .default([])
  .transform((history) => history.slice(-BOOT_HISTORY_LIMIT));

/**
 * Prepends http:// to URLs saved without a scheme ("panel.lan:8080") and returns the
 * percent-encoded form, which is safe to send in a Refresh header. Null when the value
 * is not an http(s) URL.
 */
export function normalizeRedirectUrl(url: string): string | null {
  const trimmed = url.trim();
  const candidate = URL_SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;
  if (!URL.canParse(candidate)) {
    return null;
  }

  const parsed = new URL(candidate);
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }

  // URL adds a "/" path to bare origins; keep the address as the operator wrote it
  const bareOrigin = parsed.pathname === '/' && !parsed.search && !parsed.hash && !candidate.endsWith('/');
  return bareOrigin ? parsed.href.slice(0, -1) : parsed.href;
}

export function validateMac(value: string): FieldValidation<string> {
  const result = macSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, field: 'mac', reason: MAC_ADDRESS_MESSAGE };
  }

  return { ok: true, value: result.data };
}

/**
 * Server record as found in the registry document.
 */
export const storedServerSchema = z.object({
  NAME: z.string().trim().min(1, 'Server name is required'),
  WOL_MAC_ADDRESS: macSchema,
  BROADCAST_ADDRESS: broadcastSchema.default(DEFAULT_BROADCAST_ADDRESS),
  SITE_URL: urlSchema,
  WAIT_TIME_SECONDS: waitSecondsSchema,
  MONITOR_IP: monitorAddressSchema,
  MONITOR_PORT: portSchema('Monitor port').default(DEFAULT_MONITOR_PORT),
  LOCKED: z.boolean().default(false),
  PIN: z.coerce.string().default(''),
  BOOT_HISTORY: bootHistorySchema,
});

export const registryDocumentSchema = z.object({
  PORT: portSchema('PORT'),
  SERVERS: z.array(storedServerSchema).min(1, 'At least one server must be configured'),
});

/**
 * Single-server document written by the first gateway release.
 */
export const legacyDocumentSchema = z.object({
  WOL_MAC_ADDRESS: macSchema,
  SITE_URL: urlSchema,
  WAIT_TIME_SECONDS: waitSecondsSchema,
  PORT: portSchema('PORT'),
  BROADCAST_ADDRESS: broadcastSchema.optional(),
});

function firstIssue(error: ZodError): { field: string; reason: string } {
  const issue = error.issues[0];
  return {
    field: issue ? issue.path.join('.') : '',
    reason: issue ? issue.message : 'Invalid value',
  };
}

export function validateServerEntry(raw: unknown): FieldValidation<StoredServer> {
  const result = storedServerSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, ...firstIssue(result.error) };
  }

  return { ok: true, value: result.data };
}

/**
 * Parses a registry document, upgrading the legacy single-server layout.
 */
export function parseRegistryDocument(
  raw: unknown
): FieldValidation<{ document: RegistryDocument; upgraded: boolean }> {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return { ok: false, field: '', reason: 'Registry document must be a JSON object' };
  }

  if ('SERVERS' in raw) {
    const result = registryDocumentSchema.safeParse(raw);
    if (!result.success) {
      return { ok: false, ...firstIssue(result.error) };
    }
    return { ok: true, value: { document: result.data, upgraded: false } };
  }

  if ('WOL_MAC_ADDRESS' in raw || 'SITE_URL' in raw) {
    const result = legacyDocumentSchema.safeParse(raw);
    if (!result.success) {
      return { ok: false, ...firstIssue(result.error) };
    }

    const legacy = result.data;
    return {
      ok: true,
      value: {
        upgraded: true,
        document: {
          PORT: legacy.PORT,
          SERVERS: [
            {
              NAME: LEGACY_SERVER_NAME,
              WOL_MAC_ADDRESS: legacy.WOL_MAC_ADDRESS,
              BROADCAST_ADDRESS: legacy.BROADCAST_ADDRESS ?? DEFAULT_BROADCAST_ADDRESS,
              SITE_URL: legacy.SITE_URL,
              WAIT_TIME_SECONDS: legacy.WAIT_TIME_SECONDS,
              MONITOR_PORT: DEFAULT_MONITOR_PORT,
              LOCKED: false,
              PIN: '',
              BOOT_HISTORY: [],
            },
          ],
        },
      },
    };
  }

  return {
    ok: false,
    field: 'SERVERS',
    reason: 'Registry document has neither a SERVERS list nor legacy single-server keys',
  };
}

/**
 * Schema for server create/update bodies in the admin API
 */
export const serverInputSchema = z
  .object({
    name: z.string().trim().min(1, 'Server name is required').max(255, 'Server name must not exceed 255 characters'),
    macAddress: macSchema,
    broadcastAddress: broadcastSchema.default(DEFAULT_BROADCAST_ADDRESS),
    redirectUrl: urlSchema,
    waitSeconds: waitSecondsSchema.default(60),
    monitorAddress: monitorAddressSchema,
    monitorPort: portSchema('Monitor port').default(DEFAULT_MONITOR_PORT),
    locked: z.boolean().default(false),
    pin: z.coerce.string().trim().max(64, 'PIN must not exceed 64 characters').default(''),
  })
  .strict();

export type ServerInputBody = z.infer<typeof serverInputSchema>;

/**
 * Schema for the PIN submission on POST /wake/:id
 */
export const pinSubmissionSchema = z
  .object({
    pin: z.coerce.string().max(64, 'PIN must not exceed 64 characters').optional(),
  })
  .passthrough();

/**
 * Schema for GET /ping_status/:id query string
 */
export const statusQuerySchema = z.object({
  elapsed: z.coerce
    .number({ invalid_type_error: 'elapsed must be a number of seconds' })
    .nonnegative('elapsed must not be negative')
    .finite('elapsed must be finite')
    .optional(),
});

/**
 * Schema for server id path parameters in the admin API
 */
export const serverIdParamSchema = z.object({
  id: z.coerce.number().int('Server id must be an integer').nonnegative('Server id must not be negative'),
});
