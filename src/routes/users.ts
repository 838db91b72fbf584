import { Router } from "express";
import { UserController } from "../controllers/users";
import { handle } from "./respond";

export function usersRouter(users: UserController): Router {
  const router = Router();

  router.get(
    "/",
    handle((req) => users.index(req.session, req.query.q))
  );
  // before /:id, which would swallow them
  router.get("/profile", handle((req) => users.editProfile(req.session)));
  router.post(
    "/profile",
    handle((req) => users.updateProfile(req.session, req.body))
  );
  router.post("/delete", handle((req) => users.destroy(req.session)));
  router.get(
    "/:id",
    handle((req) => users.show(req.session, req.params.id))
  );

  return router;
}
