import express, { RequestHandler } from "express";
import { AppContext } from "../context";
import { createAdminControllers } from "../controllers/adminControllers";
import { adminOnly } from "../middlewares/auth/roleGuard";
import { createUpload } from "../middlewares/fileUpload";

export const createAdminRoutes = (ctx: AppContext, protect: RequestHandler) => {
  const router = express.Router();
  const form = createUpload(ctx.config.uploads.maxBytes).none();
  const { listUsers, createUser, updateUser, deleteUser, getUserApplications } = createAdminControllers(ctx);

  router.use(protect, adminOnly);

  router.get("/users", listUsers);
  router.post("/users", form, createUser);
  router.put("/users/:username", form, updateUser);
  router.delete("/users/:username", deleteUser);
  router.get("/applications/:username", getUserApplications);

  return router;
};
