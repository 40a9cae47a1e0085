import { z } from 'zod';

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;
// setTimeout delays are 32-bit signed; anything larger fires after 1 ms
const MAX_TIMER_MINUTES = Math.floor(0x7fffffff / MINUTE_MS);

const flag = z
  .string()
  .optional()
  .transform((v) => (v ?? '').trim().toLowerCase() === 'true');

const idList = z
  .string()
  .optional()
  .transform((v) => (v ?? '').split(',').map((s) => s.trim()).filter(Boolean));

const envSchema = z.object({
  BOT_TOKEN: z.string().trim().optional(),
  CLIENT_ID: z.string().trim().optional(),
  DEV_GUILD_ID: z.string().trim().optional(),
  REGISTER_ON_START: flag,
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  BJ_IDLE_HOURS: z.coerce.number().positive().default(2),
  BJ_ADMIN_IDLE_HOURS: z.coerce.number().positive().default(1),
  BJ_SWEEP_INTERVAL_MINUTES: z.coerce.number().positive().max(MAX_TIMER_MINUTES).default(60),
  BJ_SWEEP_BACKOFF_MINUTES: z.coerce.number().positive().max(MAX_TIMER_MINUTES).default(5),
  ADMIN_USER_IDS: idList,
});

export type AppConfig = {
  token: string | null;
  clientId: string | null;
  devGuildId: string | null;
  registerOnStart: boolean;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  blackjack: {
    /** Idle time after which the background sweep drops a table. */
    idleMs: number;
    /** Idle threshold used by the admin /cleanup command. */
    adminIdleMs: number;
    sweepIntervalMs: number;
    sweepBackoffMs: number;
  };
  adminUserIds: ReadonlySet<string>;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function emptyToNull(v: string | undefined): string | null {
  return v && v.length > 0 ? v : null;
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    token: emptyToNull(e.BOT_TOKEN),
    clientId: emptyToNull(e.CLIENT_ID),
    devGuildId: emptyToNull(e.DEV_GUILD_ID),
    registerOnStart: e.REGISTER_ON_START,
    logLevel: e.LOG_LEVEL,
    blackjack: {
      idleMs: e.BJ_IDLE_HOURS * HOUR_MS,
      adminIdleMs: e.BJ_ADMIN_IDLE_HOURS * HOUR_MS,
      sweepIntervalMs: e.BJ_SWEEP_INTERVAL_MINUTES * MINUTE_MS,
      sweepBackoffMs: e.BJ_SWEEP_BACKOFF_MINUTES * MINUTE_MS,
    },
    adminUserIds: new Set(e.ADMIN_USER_IDS),
  };
}

let cfg: AppConfig | null = null;

// For testing: reset the cache
export function resetConfigCache() {
  cfg = null;
}

export function getConfig(): AppConfig {
  if (!cfg) cfg = parseConfig(process.env);
  return cfg;
}
