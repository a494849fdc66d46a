// server/index.ts
import express from "express";
import cors from "cors";
import { registerRoutes } from "./routes";
import { createServices } from "./services/serviceFactory";
import { assertRequiredEnv, env } from "./utils/env";

const app = express();

app.use(express.json({ limit: "1mb" }));
app.use(express.urlencoded({ extended: false, limit: "1mb" }));
app.use(
  cors({
    origin: "*",
    methods: ["GET", "POST", "OPTIONS"],
  })
);

// Optional root
app.get("/", (_req, res) => {
  res.type("text/plain").send("OK");
});

// ----------------------------------------------------------------------------
// Boot
// ----------------------------------------------------------------------------
try {
  assertRequiredEnv();
  const services = createServices();
  registerRoutes(app, services);

  app.listen(env.PORT, () => {
    console.log(`[express] serving on port ${env.PORT}`);
    console.log(`[doorline] NODE_ENV=${env.NODE_ENV} | language=${env.DEFAULT_LANGUAGE} | max attempts=${env.MAX_STAGE_ATTEMPTS}`);
    console.log(`[doorline] Turn endpoint: POST /generate`);
  });
} catch (err) {
  console.error("Startup error:", err);
  process.exit(1);
}

// Safety logs
process.on("unhandledRejection", (reason) => {
  console.error("[unhandledRejection]", reason);
});
process.on("uncaughtException", (err) => {
  console.error("[uncaughtException]", err);
});

export default app;
