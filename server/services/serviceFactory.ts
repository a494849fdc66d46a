/**
 * Picks every collaborator implementation once, at start-up, from env.
 */

import type { LanguageModel } from '../ai/languageModel';
import { LlmLanguageModel } from '../ai/languageModel';
import { getAvailableProvider } from '../ai/llmProvider';
import { env, type Env } from '../utils/env';
import { MapboxLocationService, OfflineLocationService, type GeoPoint, type LocationService } from './location';
import {
  BackendPushDispatcher,
  LogOnlyDispatcher,
  TwilioSmsDispatcher,
  type NotificationDispatcher,
} from './notifications';
import { OrderLedger } from './orderLedger';
import { BackendSmsSource, DemoSmsSource, type SmsSource } from './smsInbox';

export type ServiceConfig = Pick<
  Env,
  | 'OPENAI_API_KEY'
  | 'OPENAI_BASE_URL'
  | 'ANTHROPIC_API_KEY'
  | 'MAPBOX_API_KEY'
  | 'HOME_LAT'
  | 'HOME_LNG'
  | 'HOME_ADDRESS'
  | 'BACKEND_URL'
  | 'BACKEND_API_KEY'
  | 'OWNER_PHONE_NUMBER'
  | 'NOTIFICATION_CHANNEL'
  | 'TWILIO_ACCOUNT_SID'
  | 'TWILIO_AUTH_TOKEN'
  | 'TWILIO_PHONE_NUMBER'
  | 'MAX_STAGE_ATTEMPTS'
>;

export interface Services {
  /** Undefined means every model-backed step uses its rule fallback */
  languageModel?: LanguageModel;
  location: LocationService;
  sms: SmsSource;
  notifier: NotificationDispatcher;
  ledger: OrderLedger;
  home: GeoPoint & { address: string };
  ownerPhone: string;
  maxStageAttempts: number;
}

function createNotifier(config: ServiceConfig): NotificationDispatcher {
  switch (config.NOTIFICATION_CHANNEL) {
    case 'backend':
      if (config.BACKEND_URL) return new BackendPushDispatcher(config.BACKEND_URL, config.BACKEND_API_KEY);
      console.warn('[Services] NOTIFICATION_CHANNEL=backend but BACKEND_URL is empty, logging only');
      return new LogOnlyDispatcher();
    case 'twilio':
      return new TwilioSmsDispatcher(config.TWILIO_ACCOUNT_SID, config.TWILIO_AUTH_TOKEN, config.TWILIO_PHONE_NUMBER);
    case 'log':
      return new LogOnlyDispatcher();
  }
}

export function createServices(config: ServiceConfig = env, ledger: OrderLedger = new OrderLedger()): Services {
  const home = { lat: config.HOME_LAT, lng: config.HOME_LNG, address: config.HOME_ADDRESS };

  const credentials = {
    openaiApiKey: config.OPENAI_API_KEY,
    openaiBaseUrl: config.OPENAI_BASE_URL,
    anthropicApiKey: config.ANTHROPIC_API_KEY,
  };
  const languageModel = getAvailableProvider(credentials) ? new LlmLanguageModel(credentials) : undefined;

  const location: LocationService = config.MAPBOX_API_KEY
    ? new MapboxLocationService(config.MAPBOX_API_KEY, home)
    : new OfflineLocationService(home);

  const sms: SmsSource = config.BACKEND_URL
    ? new BackendSmsSource(config.BACKEND_URL, config.BACKEND_API_KEY)
    : new DemoSmsSource();

  const notifier = createNotifier(config);

  console.log(
    `[Services] model=${languageModel?.name ?? 'rules'} location=${location.name} sms=${sms.name} notify=${notifier.name}`
  );

  return {
    languageModel,
    location,
    sms,
    notifier,
    ledger,
    home,
    ownerPhone: config.OWNER_PHONE_NUMBER,
    maxStageAttempts: config.MAX_STAGE_ATTEMPTS,
  };
}
