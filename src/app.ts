import express, { NextFunction, Request, Response } from "express";
import { relayMessage, requireApiKey } from "./middleware/relay.middleware";
import { RelayService } from "./relay/relayService";
import { RateLimitPolicy } from "./types/policy";
import { getMetrics } from "./utils/metrics";

export interface AppDependencies {
  relay: RelayService;
  policy: RateLimitPolicy;
  apiToken: string;
}

/** Status carried by body-parser's errors (413 too large, 415 charset, ...). */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) {
    return undefined;
  }
  const status = "status" in err ? err.status : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

export function createApp({ relay, policy, apiToken }: AppDependencies) {
  const app = express();
  app.use(express.json({ limit: "256kb" }));

  app.get("/metrics", (_req, res) => {
    res.json(getMetrics());
  });

  app.post(
    "/api/messages",
    requireApiKey(apiToken),
    relayMessage(relay, policy)
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(
    (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof SyntaxError) {
        return res.status(400).json({ message: "Malformed JSON body" });
      }
      const status = clientErrorStatus(err);
      if (status !== undefined) {
        const message = err instanceof Error ? err.message : "Bad request";
        return res.status(status).json({ message });
      }
      console.error("Request handling failure:", err);
      res.status(500).json({ message: "Internal error" });
    }
  );

  return app;
}
