import { Router } from "express";
import { AuthController } from "../controllers/auth";
import { regenerateSession } from "../middleware/session";
import { handle } from "./respond";

export function authRouter(auth: AuthController): Router {
  const router = Router();

  router.get("/", handle((req) => auth.home(req.session)));
  router.get("/signup", handle((req) => auth.signupForm(req.session)));
  router.get("/login", handle((req) => auth.loginForm(req.session)));
  router.post("/logout", handle((req) => auth.logout(req.session)));

  // a fresh session id before anyone is logged in on it
  router.post(
    "/signup",
    handle(async (req) => {
      await regenerateSession(req);
      return auth.signup(req.session, req.body);
    })
  );
  router.post(
    "/login",
    handle(async (req) => {
      await regenerateSession(req);
      return auth.login(req.session, req.body);
    })
  );

  return router;
}
