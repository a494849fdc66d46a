import type { Express } from "express";
import { registerConversation } from "./routes/conversation";
import { registerOrders } from "./routes/orders";
import { registerAdmin } from "./routes/admin";
import type { Services } from "./services/serviceFactory";
import { env } from "./utils/env";

export function registerRoutes(app: Express, services: Services, internalSecret: string = env.INTERNAL_SECRET): void {
  registerConversation(app, services);
  registerOrders(app, services, internalSecret);
  registerAdmin(app, internalSecret);

  // Simple health check for the telephony bridge and monitoring
  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      env: env.NODE_ENV,
      language_model: Boolean(services.languageModel),
      location: services.location.name,
      sms: services.sms.name,
      notifier: services.notifier.name,
      orders: services.ledger.list().length,
    });
  });
}
