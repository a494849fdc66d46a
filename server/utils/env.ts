// Home location the courier is routed to (defaults to a central Bangalore point)
const HOME_LAT = Number(process.env.HOME_LAT || '12.9716');
const HOME_LNG = Number(process.env.HOME_LNG || '77.5946');

function parseChannel(value: string | undefined): 'backend' | 'twilio' | 'log' {
  if (value === 'backend' || value === 'twilio') return value;
  return 'log';
}

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: Number(process.env.PORT) || 5000,
  INTERNAL_SECRET: process.env.INTERNAL_SECRET || '',
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  OPENAI_BASE_URL: process.env.OPENAI_BASE_URL || '',
  ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY || '',
  MAPBOX_API_KEY: process.env.MAPBOX_API_KEY || '',
  HOME_LAT: Number.isFinite(HOME_LAT) ? HOME_LAT : 12.9716,
  HOME_LNG: Number.isFinite(HOME_LNG) ? HOME_LNG : 77.5946,
  HOME_ADDRESS: process.env.HOME_ADDRESS || 'the delivery address',
  BACKEND_URL: (process.env.BACKEND_URL || '').replace(/\/+$/, ''),
  BACKEND_API_KEY: process.env.BACKEND_API_KEY || '',
  OWNER_PHONE_NUMBER: process.env.OWNER_PHONE_NUMBER || '',
  NOTIFICATION_CHANNEL: parseChannel(process.env.NOTIFICATION_CHANNEL),
  TWILIO_ACCOUNT_SID: process.env.TWILIO_ACCOUNT_SID || '',
  TWILIO_AUTH_TOKEN: process.env.TWILIO_AUTH_TOKEN || '',
  TWILIO_PHONE_NUMBER: process.env.TWILIO_PHONE_NUMBER || '',
  DEFAULT_LANGUAGE: process.env.DEFAULT_LANGUAGE === 'hi' ? 'hi' : 'en',
  MAX_STAGE_ATTEMPTS: Math.max(1, Number(process.env.MAX_STAGE_ATTEMPTS) || 3),
} as const;

export type Env = typeof env;

const required = ['INTERNAL_SECRET'] as const;

/**
 * Called once at boot. Module import stays side-effect free so tests can
 * load anything that reads `env` without a full environment.
 */
export function assertRequiredEnv(): void {
  for (const k of required) {
    if (!env[k]) {
      throw new Error(`Missing required env: ${k}`);
    }
  }
  if (env.NOTIFICATION_CHANNEL === 'twilio' && !env.TWILIO_ACCOUNT_SID) {
    throw new Error('Missing required env: TWILIO_ACCOUNT_SID (NOTIFICATION_CHANNEL=twilio)');
  }
}
