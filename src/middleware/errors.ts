import { ErrorRequestHandler, RequestHandler } from "express";
import { HttpError, NotFoundError, errorMessage } from "../errors";
import { logger } from "../logger";
import { PageRenderer } from "../views/page";

export const notFound: RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`No route for ${req.method} ${req.path}`));
};

export function errorHandler(pages: PageRenderer): ErrorRequestHandler {
  return async (err: unknown, req, res, _next) => {
    const status = err instanceof HttpError ? err.status : 500;
    const message = status >= 500 ? "Something went wrong." : errorMessage(err);
    if (status >= 500) {
      logger.error("request failed", {
        method: req.method,
        path: req.path,
        error: errorMessage(err),
      });
    }

    try {
      const html = await pages.render(
        "errors/error",
        { status: String(status), message },
        { title: `${status} ${message}` }
      );
      res.status(status).type("html").send(html);
    } catch (renderErr) {
      logger.error("error page failed to render", {
        error: errorMessage(renderErr),
      });
      res.status(status).type("text").send(message);
    }
  };
}
