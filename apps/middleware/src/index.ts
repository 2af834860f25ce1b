import { CONFIG } from "./config.js";
import { startApiServer } from "./api/server.js";
import { createAppContext, type AppContext } from "./state/appContext.js";
import { createRuntime, CancelledError, type Effect } from "@ordergate/shared";

type MiddlewareEnv = {
  ctx: AppContext;
};

const serve: Effect<MiddlewareEnv, void> = async (env, signal) => {
  const { ctx } = env;
  ctx.logger.info(`Order gateway starting… chain=${ctx.config.chainId} audit=${ctx.config.auditPath}`);
  if (!ctx.chainStatus.available) {
    ctx.logger.warn(`Order endpoints will answer 503: ${ctx.chainStatus.reason}`);
  }

  const server = startApiServer(ctx);
  await new Promise<void>((resolve) => {
    const stop = () => {
      ctx.logger.info("Shutting down");
      server.close(() => resolve());
    };
    if (signal.aborted) stop();
    else signal.addEventListener("abort", stop, { once: true });
  });
};

async function main() {
  const ctx = await createAppContext(CONFIG);
  const run = createRuntime<MiddlewareEnv>({ ctx }).run(serve);

  process.on("SIGINT", () => run.cancel());
  process.on("SIGTERM", () => run.cancel());

  await run.promise;
}

main().catch((e: unknown) => {
  if (e instanceof CancelledError) return;
  console.error(e);
  process.exitCode = 1;
});
