import express, { RequestHandler } from "express";
import { AppContext } from "../context";
import { createApplicationControllers } from "../controllers/applicationsControllers";
import { createUpload, FILE_FIELD } from "../middlewares/fileUpload";

export const createApplicationRoutes = (ctx: AppContext, protect: RequestHandler) => {
  const router = express.Router();
  const upload = createUpload(ctx.config.uploads.maxBytes);
  const {
    getApplications,
    getApplication,
    createApplication,
    updateApplication,
    deleteApplication,
  } = createApplicationControllers(ctx);

  router.use(protect);

  router.get("/", getApplications);
  router.get("/:id", getApplication);
  router.post("/", upload.single(FILE_FIELD), createApplication);
  router.put("/:id", upload.single(FILE_FIELD), updateApplication);
  router.delete("/:id", deleteApplication);

  return router;
};
