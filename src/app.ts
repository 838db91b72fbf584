import express, { Express } from "express";
import cors from "cors";
import { AuthController } from "./controllers/auth";
import { ControllerDeps } from "./controllers/controller";
import { UserController } from "./controllers/users";
import { errorHandler, notFound } from "./middleware/errors";
import { csrfProtection, sessionMiddleware } from "./middleware/session";
import { authRouter } from "./routes/auth";
import { usersRouter } from "./routes/users";

export type AppOptions = ControllerDeps & {
  sessionSecret: string;
  csrf: boolean;
  corsOrigins: string[];
  publicDir?: string;
};

const localhostRegex = /^http:\/\/localhost:\d+$/;

export function createApp(opts: AppOptions): Express {
  const app = express();

  app.use(
    cors({
      origin(origin, cb) {
        if (!origin) return cb(null, true);
        if (opts.corsOrigins.includes(origin) || localhostRegex.test(origin))
          return cb(null, true);
        return cb(new Error("Not allowed by CORS"));
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "x-requested-with"],
      credentials: true,
      maxAge: 86400,
    })
  );

  if (opts.publicDir) app.use(express.static(opts.publicDir));
  // ahead of the session, so health checks never store one
  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());
  app.use(sessionMiddleware(opts.sessionSecret));
  app.use(csrfProtection(opts.csrf));

  app.use(authRouter(new AuthController(opts)));
  app.use("/users", usersRouter(new UserController(opts)));

  app.use(notFound);
  app.use(errorHandler(opts.pages));
  return app;
}
