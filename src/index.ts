import { config, type AppConfig } from "./config";
import { errorMessage } from "./errors";
import { HttpClient } from "./httpClient";
import { LocationRegistry } from "./locationRegistry";
import { logger } from "./logger";
import { NotificationEvaluator } from "./notificationEvaluator";
import { NotificationLog } from "./notificationLog";
import { Orchestrator } from "./orchestrator";
import { QueryService } from "./queryService";
import { ScheduleStore } from "./scheduleStore";
import { AddressLookupAdapter } from "./sources";
import { StorageService } from "./storageService";
import { SubscriberRepository } from "./subscriberRepository";
import { TelegramService, disabledDelivery, type DeliveryChannel } from "./telegramService";

export interface Services {
  registry: LocationRegistry;
  store: ScheduleStore;
  subscribers: SubscriberRepository;
  notifications: NotificationLog;
  evaluator: NotificationEvaluator;
  orchestrator: Orchestrator;
  queries: QueryService;
}

export function createServices(
  appConfig: AppConfig,
  registry: LocationRegistry,
  delivery: DeliveryChannel
): Services {
  const storage = new StorageService(appConfig.storagePath);
  const http = new HttpClient({
    timeoutMs: appConfig.requestTimeoutMs,
    userAgent: appConfig.userAgent,
  });

  const store = new ScheduleStore(storage);
  const subscribers = new SubscriberRepository(storage);
  const notifications = new NotificationLog(storage);
  const evaluator = new NotificationEvaluator(registry, store, subscribers, notifications, delivery, {
    timezone: appConfig.timezone,
    leadMinutes: appConfig.leadMinutes,
    toleranceMinutes: appConfig.toleranceMinutes,
    retentionDays: appConfig.notificationRetentionDays,
  });
  const orchestrator = new Orchestrator(registry, store, subscribers, evaluator, http, {
    timezone: appConfig.timezone,
    slotMinutes: appConfig.slotMinutes,
    refreshCron: appConfig.refreshCron,
    notifyCron: appConfig.notifyCron,
  });
  const queries = new QueryService(registry, store, subscribers, new AddressLookupAdapter(http));

  return { registry, store, subscribers, notifications, evaluator, orchestrator, queries };
}

async function bootstrap(): Promise<void> {
  const registry = await LocationRegistry.fromFile(config.locationsPath);
  logger.info(`Loaded ${registry.list().length} location(s) from ${config.locationsPath}`);

  let delivery: DeliveryChannel = disabledDelivery;
  if (config.telegram) {
    delivery = new TelegramService(config.telegram.botToken);
  } else {
    logger.warn("TELEGRAM_BOT_TOKEN is not set, notifications will only be logged");
  }

  const { orchestrator } = createServices(config, registry, delivery);
  await orchestrator.start();
  logger.info(`State is stored at ${config.storagePath}`);

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down scheduler...`);
    orchestrator.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    logger.error(`Startup failed: ${errorMessage(error)}`, error);
    process.exit(1);
  });
}
