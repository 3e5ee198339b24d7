import express, { RequestHandler } from "express";
import { AppContext } from "../context";
import { createAuthControllers } from "../controllers/AuthControllers";
import { createUpload } from "../middlewares/fileUpload";

export const createAuthRoutes = (ctx: AppContext, protect: RequestHandler) => {
  const router = express.Router();
  const { loginUser, logoutUser, sessionInfo } = createAuthControllers(ctx);
  // login forms may arrive as multipart without a file
  const form = createUpload(ctx.config.uploads.maxBytes).none();

  router.post("/login", form, loginUser);
  router.post("/logout", logoutUser);
  router.get("/session", protect, sessionInfo);

  return router;
};
