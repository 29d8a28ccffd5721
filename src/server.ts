import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { SlidingWindowLimiter } from "./limiter/slidingWindow";
import { RequestRouter } from "./router/requestRouter";
import { ChatCompletionsGenerator } from "./relay/generator";
import { RelayService } from "./relay/relayService";
import { describeError } from "./utils/errors";

function main() {
  const config = loadConfig();

  const limiter = new SlidingWindowLimiter({
    limit: config.rateLimit.limit,
    windowSeconds: config.rateLimit.windowSeconds,
  });
  const stopSweeper = limiter.startSweeper(config.rateLimit.sweepIntervalSeconds);

  const router = new RequestRouter({
    limiter,
    creatorName: config.creatorName,
    modelName: config.generation.model,
  });
  const relay = new RelayService({
    router,
    generator: new ChatCompletionsGenerator(config.generation),
    maxChunkLength: config.maxChunkLength,
  });

  const app = createApp({
    relay,
    policy: limiter.policy,
    apiToken: config.relayApiToken,
  });

  const server = app.listen(config.port, () => {
    console.log(`Relay listening on port ${config.port}`);
    console.log(
      `Rate limiter initialized: ${limiter.policy.limit} requests per ${limiter.policy.windowSeconds} seconds`
    );
    if (config.debug) {
      console.log(`Max message length: ${config.maxChunkLength}`);
      console.log(`Request timeout: ${config.generation.timeoutSeconds} seconds`);
    }
  });

  const shutdown = () => {
    stopSweeper();
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (err) {
  console.error("Fatal error:", describeError(err));
  process.exit(1);
}
