import express, { type Express } from "express";
import helmet from "helmet";
import cors from "cors";
import productRoutes from "./routes/product.routes.js";
import errorRoutes from "./routes/error.routes.js";
import { env } from "./config/env.js";
import { getAllProducts } from "./services/product.service.js";
import { httpsRedirect } from "./middleware/httpsRedirect.js";
import { requestLogger } from "./middleware/requestLogger.js";
import { errorHandler, notFound } from "./middleware/errorHandler.js";

export interface AppOptions {
  forceHttps?: boolean;
  httpsPort?: number;
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();

  app.set("trust proxy", true); // req.secure follows X-Forwarded-Proto

  app.use(helmet()); // Secure HTTP headers, HSTS included, X-Powered-By removed
  app.use(cors({ origin: env.CORS_ORIGIN })); // CORS
  app.use(requestLogger);

  app.use(
    httpsRedirect({
      enabled: options.forceHttps ?? env.FORCE_HTTPS,
      httpsPort: options.httpsPort ?? env.HTTPS_PORT,
    }),
  );

  // Routes
  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      products: getAllProducts().length,
    });
  });

  app.use("/api/products", productRoutes);
  app.use("/error", errorRoutes);

  // Must stay last: Express only treats 4-arg middleware as error handlers
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
