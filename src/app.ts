import cookieParser from "cookie-parser";
import cors, { CorsOptions } from "cors";
import express from "express";
import { AppContext } from "./context";
import { createProtect } from "./middlewares/auth/protect";
import { errorHandler } from "./middlewares/errorHandler";
import { requestLogger } from "./middlewares/requestLogger";
import { createAdminRoutes } from "./routes/adminRoutes";
import { createApplicationRoutes } from "./routes/applicationRoutes";
import { createAuthRoutes } from "./routes/authRoutes";
import { LOCAL_UPLOADS_ROUTE } from "./utils/storage/LocalDisk";

// job descriptions are pasted in full
const BODY_LIMIT = "1mb";

export const createApp = (ctx: AppContext) => {
  const app = express();

  const corsOptions: CorsOptions = {
    // "*" reflects the caller's origin so cookies still work
    origin: ctx.config.corsOrigins.includes("*") ? true : ctx.config.corsOrigins,
    credentials: true,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  };

  app.use(cors(corsOptions));
  app.options("*", cors(corsOptions));

  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(cookieParser());
  app.use(express.urlencoded({ extended: true, limit: BODY_LIMIT }));
  app.use(requestLogger);

  app.get("/", (_req, res) => {
    res.send("Application tracker API");
  });

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      store: ctx.stores.driver,
      storageProvider: ctx.uploads.providerKind,
    });
  });

  const protect = createProtect(ctx.config, ctx.users);

  app.use("/", createAuthRoutes(ctx, protect));
  app.use("/applications", createApplicationRoutes(ctx, protect));
  app.use("/admin", createAdminRoutes(ctx, protect));

  // locally stored uploads, including cloud fallbacks
  app.use(LOCAL_UPLOADS_ROUTE, express.static(ctx.local.rootDir));

  app.use((_req, res) => {
    res.status(404).json({ success: false, message: "Route not found" });
  });
  app.use(errorHandler);

  return app;
};
