import { Router } from "express";

import { ROLES } from "@/constants/app.constants";
import { authMiddleware } from "@/middlewares/auth.middleware";

import { CleaningServiceController } from "./cleaning-service.controller";

const router = Router();
const controller = new CleaningServiceController();

router.get("/", controller.listPublished);

router.get(
  "/admin",
  authMiddleware.verifyToken,
  authMiddleware.authorize(ROLES.ADMIN),
  controller.listAll
);

router.get("/:serviceId", controller.getPublished);

router.post(
  "/",
  authMiddleware.verifyToken,
  authMiddleware.authorize(ROLES.ADMIN),
  controller.createService
);

router.put(
  "/:serviceId",
  authMiddleware.verifyToken,
  authMiddleware.authorize(ROLES.ADMIN),
  controller.updateService
);

router.delete(
  "/:serviceId",
  authMiddleware.verifyToken,
  authMiddleware.authorize(ROLES.ADMIN),
  controller.deleteService
);

export default router;
