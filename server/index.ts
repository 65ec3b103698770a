import { config } from "./config";
import { createApp } from "./app";
import { withSource } from "./logger";

const bootLog = withSource("boot");

bootLog.info({ env: config.nodeEnv, port: config.port }, "starting server");
bootLog.info(
  {
    keywords: {
      maxKeywordSize: config.keywords.maxKeywordSize,
      limit: config.keywords.limit,
      windowing: config.keywords.windowing,
      includeTarget: config.keywords.includeTarget,
      customStopwords: !!config.keywords.stopwordsFile,
    },
    maxBodySize: config.maxBodySize,
  },
  "environment summary"
);

const { server } = createApp();

server.listen(config.port, () => {
  bootLog.info({ port: config.port }, "serving on port");
});

function shutdown(signal: string) {
  bootLog.info({ signal }, "shutting down");
  server.close((err) => {
    if (err) {
      bootLog.error({ err }, "error while closing server");
      process.exitCode = 1;
    }
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
