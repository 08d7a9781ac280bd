import { z } from 'zod';
import dotenv from 'dotenv';
import ipaddr from 'ipaddr.js';
import { ConfigError } from './errors.js';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || undefined });

const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') return value;
    const v = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(v)) return true;
    if (['false', '0', 'no', 'off', ''].includes(v)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
    return z.NEVER;
  });

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  LOG_PRETTY: envBoolean.optional().default(false),

  // Sinkhole address written into every redirect rule.
  REDIRECT_TO_IP: z
    .string()
    .trim()
    .refine((v) => ipaddr.isValid(v), { message: 'must be an IPv4 or IPv6 address' }),

  SOURCES_FILE: z.string().optional().default('/etc/gateway-adblock/sources.txt'),
  DENIED_DOMAINS_FILE: z.string().optional().default('/var/lib/gateway-adblock/denied_domains.txt'),
  ALLOWED_DOMAINS_FILE: z.string().optional().default(''),
  DENIED_DOMAINS_MAX_AGE_HOURS: z.coerce.number().min(0).optional().default(2),
  RULE_COMMENT: z.string().min(1).optional().default('ADBlock'),

  SOURCE_FAILURE_POLICY: z.enum(['fail-fast', 'skip']).optional().default('fail-fast'),
  KEEP_STALE_ON_REFRESH_ERROR: envBoolean.optional().default(true),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(250).optional().default(15_000),
  FETCH_MAX_BYTES: z.coerce.number().int().positive().optional().default(25 * 1024 * 1024),

  GATEWAY_TIMEOUT_MS: z.coerce.number().int().min(250).optional().default(10_000),
  GATEWAY_API_PORT: z.coerce.number().int().positive().max(65535).optional(),
  GATEWAY_API_TLS: envBoolean.optional().default(false),
  GATEWAY_REST_SCHEME: z.enum(['http', 'https']).optional().default('https'),
  // RouterOS ships self-signed certificates by default.
  GATEWAY_TLS_INSECURE: envBoolean.optional().default(false),

  DRY_RUN: envBoolean.optional().default(false),

  HOST: z.string().optional().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().optional().default(8080),
  RUN_INTERVAL_MINUTES: z.coerce.number().int().min(1).optional().default(60),
  ADMIN_TOKEN: z.string().optional().default('')
});

export type LoginMethod = 'plain' | 'token' | 'rest';

export type DeviceConfig = {
  /** Variable suffix, e.g. `GATEWAY_OFFICE` -> `office`. */
  name: string;
  host: string;
  user: string;
  password: string;
  method: LoginMethod;
};

export type AppConfig = Omit<z.infer<typeof schema>, 'LOG_LEVEL' | 'GATEWAY_API_PORT'> & {
  LOG_LEVEL: NonNullable<z.infer<typeof schema>['LOG_LEVEL']>;
  GATEWAY_API_PORT: number;
  devices: DeviceConfig[];
};

const DEVICE_PREFIX = 'GATEWAY_';

// Settings that share the device prefix but are not devices.
const RESERVED_GATEWAY_KEYS = new Set([
  'GATEWAY_TIMEOUT_MS',
  'GATEWAY_API_PORT',
  'GATEWAY_API_TLS',
  'GATEWAY_REST_SCHEME',
  'GATEWAY_TLS_INSECURE'
]);

const LOGIN_METHODS: readonly LoginMethod[] = ['plain', 'token', 'rest'];

function isLoginMethod(value: string): value is LoginMethod {
  return LOGIN_METHODS.some((m) => m === value);
}

// `host[:method]`, where host may be a bare or bracketed IPv6 address.
function splitHostAndMethod(name: string, target: string): { host: string; method: LoginMethod } {
  const m = target.match(/^(.*):([a-z]+)$/i);
  const suffix = m ? m[2].toLowerCase() : '';
  let host = target;
  let method: LoginMethod = 'plain';

  if (m && isLoginMethod(suffix)) {
    host = m[1];
    method = suffix;
  } else if (m && !ipaddr.IPv6.isValid(target)) {
    throw new ConfigError([
      `${DEVICE_PREFIX}${name.toUpperCase()}: unknown login method "${suffix}" (expected plain, token or rest)`
    ]);
  }

  const bracketed = host.match(/^\[(.+)\]$/);
  return { host: bracketed ? bracketed[1] : host, method };
}

/**
 * Parses `user/password@host[:method]`. The password may itself contain `/` or `@`:
 * the user ends at the first `/` and the host starts after the last `@`.
 */
export function parseDeviceString(name: string, raw: string): DeviceConfig {
  const value = raw.trim();
  const slash = value.indexOf('/');
  const at = value.lastIndexOf('@');
  if (slash <= 0 || at < slash) {
    throw new ConfigError([`${DEVICE_PREFIX}${name.toUpperCase()}: expected user/password@host[:method]`]);
  }

  const user = value.slice(0, slash);
  const password = value.slice(slash + 1, at);
  const target = value.slice(at + 1);

  const { host, method } = splitHostAndMethod(name, target);
  if (!host) {
    throw new ConfigError([`${DEVICE_PREFIX}${name.toUpperCase()}: missing host`]);
  }

  return { name, host, user, password, method };
}

export function parseDevices(env: NodeJS.ProcessEnv): DeviceConfig[] {
  return Object.keys(env)
    .filter((key) => key.startsWith(DEVICE_PREFIX) && !RESERVED_GATEWAY_KEYS.has(key))
    .sort()
    .flatMap((key) => {
      const raw = env[key];
      if (!raw || !raw.trim()) return [];
      return [parseDeviceString(key.slice(DEVICE_PREFIX.length).toLowerCase(), raw)];
    });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }

  const cfg = parsed.data;
  const defaultLevel = cfg.NODE_ENV === 'test' ? 'silent' : 'info';

  return {
    ...cfg,
    LOG_LEVEL: cfg.LOG_LEVEL ?? defaultLevel,
    GATEWAY_API_PORT: cfg.GATEWAY_API_PORT ?? (cfg.GATEWAY_API_TLS ? 8729 : 8728),
    devices: parseDevices(env)
  };
}
