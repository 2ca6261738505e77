import express from "express";
import { healthRouter } from "./routes/health.js";
import { createDraftRouter } from "./routes/draft.js";
import { AppError, errorBody, notFoundError } from "./errors.js";
import { buildRequestLog, errorMessage, log } from "./logger.js";
import type { DraftEngine } from "./services/draftEngine.js";

function isTestRuntime(): boolean {
  return (
    process.env.NODE_ENV === "test" ||
    process.env.VITEST === "true" ||
    typeof process.env.VITEST_WORKER_ID === "string"
  );
}

export function createServer(deps: { engine: DraftEngine }) {
  const app = express();
  app.use(express.json());

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      log(
        buildRequestLog({
          method: req.method,
          path: req.originalUrl ?? req.url,
          status: res.statusCode,
          duration_ms: Date.now() - start
        })
      );
    });
    next();
  });

  app.use("/health", healthRouter);
  app.use("/draft", createDraftRouter(deps.engine));
  app.get("/", (_req, res) => {
    res.json({ ok: true, service: "engine", status: "healthy" });
  });
  app.use((_req, res) => {
    res.status(404).json(errorBody(notFoundError()));
  });

  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      void _next;
      const appErr = err instanceof AppError ? err : undefined;
      const status = appErr?.status ?? 500;
      // 4xx are client errors (expected sometimes); 5xx are server errors.
      log({
        level: status >= 500 ? "error" : "info",
        msg: "request_error",
        method: req.method,
        path: req.originalUrl ?? req.url,
        status,
        code: appErr?.code ?? "INTERNAL_ERROR",
        error: errorMessage(err),
        error_stack:
          (status >= 500 && !isTestRuntime()) || process.env.LOG_STACK === "1"
            ? err instanceof Error
              ? err.stack
              : undefined
            : undefined
      });
      res
        .status(status)
        .json(errorBody(appErr ?? (err instanceof Error ? err : new Error(errorMessage(err)))));
    }
  );

  return app;
}
