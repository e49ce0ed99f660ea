import type { Request, Response, NextFunction } from "express";
import logger from "../config/logger.js";

export interface HttpsRedirectOptions {
  enabled: boolean;
  httpsPort: number;
}

// 307 keeps the method; req.secure needs `trust proxy` to see X-Forwarded-Proto
export function httpsRedirect({ enabled, httpsPort }: HttpsRedirectOptions) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!enabled || req.secure) return next();

    const port = httpsPort === 443 ? "" : `:${httpsPort}`;
    const location = `https://${req.hostname}${port}${req.originalUrl}`;
    logger.debug("Redirecting to HTTPS", { from: req.originalUrl, to: location });
    res.redirect(307, location);
  };
}
