// src/app.ts
import express, { type Request, type Response } from "express";
import cors from "cors";
import type { Knex } from "knex";
import { env } from "./config.js";
import { requireApiKey } from "./middleware/auth.js";
import { errorHandler, notFound } from "./middleware/errors.js";
import { orderRoutes } from "./routes/orders.js";
import { paymentRoutes } from "./routes/payments.js";
import { pspRoutes } from "./routes/psp.js";
import { isProvider, type PaymentGateway, type Provider } from "./psp/gateway.js";

export type AppDeps = {
  db: Knex;
  gateway: PaymentGateway;
  apiKey?: string;
  webhookSecret?: string;
  countryCode?: string;
  defaultProvider?: Provider;
};

function providerFromEnv(): Provider {
  return isProvider(env.AZAMPAY_PROVIDER) ? env.AZAMPAY_PROVIDER : "Mpesa";
}

export function createApp(deps: AppDeps) {
  const app = express();
  app.disable("x-powered-by");

  /** capture raw body for callback HMAC */
  app.use(
    express.json({
      limit: "1mb",
      verify: (req: Request, _res, buf) => {
        req.rawBody = buf;
      },
    })
  );

  app.use(
    cors({
      origin: env.FRONTEND_ORIGIN === "*" ? true : env.FRONTEND_ORIGIN.split(",").map((o) => o.trim()),
      methods: ["GET", "POST", "PATCH", "OPTIONS"],
      allowedHeaders: ["Content-Type", "x-api-key", "x-gateway-signature"],
    })
  );

  /** health */
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      ok: true,
      uptime: Math.round(process.uptime()),
      ts: new Date().toISOString(),
    });
  });

  // Gateway callbacks authenticate by signature, not by API key.
  app.use("/api/payments", pspRoutes(deps.db, deps.webhookSecret ?? env.GATEWAY_WEBHOOK_SECRET));

  app.use("/api", requireApiKey(deps.apiKey ?? env.API_ACCESS_KEY));
  app.use("/api/orders", orderRoutes(deps.db));
  app.use(
    "/api/payments",
    paymentRoutes(deps.db, deps.gateway, {
      countryCode: deps.countryCode ?? env.DEFAULT_COUNTRY_CODE,
      defaultProvider: deps.defaultProvider ?? providerFromEnv(),
    })
  );

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
