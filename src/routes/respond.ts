import { Request, RequestHandler, Response } from "express";
import { ViewResult } from "../types";

export function respond(res: Response, result: ViewResult) {
  if (result.kind === "redirect") return res.redirect(302, result.location);
  return res.status(result.status).type("html").send(result.html);
}

type Action = (req: Request) => ViewResult | Promise<ViewResult>;

/** Adapts a controller action; rejections go to the error middleware */
export const handle =
  (action: Action): RequestHandler =>
  async (req, res, next) => {
    try {
      respond(res, await action(req));
    } catch (e) {
      next(e);
    }
  };
