// file: src/modules/user/user.route.ts

import { Router } from "express";

import { ROLES } from "@/constants/app.constants";
import { authMiddleware } from "@/middlewares/auth.middleware";

import { UserController } from "./user.controller";

const router = Router();
const userController = new UserController();

router.use(authMiddleware.verifyToken);

router.get("/profile", userController.getProfile);
router.patch(
  "/profile",
  authMiddleware.authorize(ROLES.CLIENT),
  userController.updateProfile
);

router.post(
  "/cleaners",
  authMiddleware.authorize(ROLES.ADMIN),
  userController.createCleaner
);
router.get(
  "/cleaners",
  authMiddleware.authorize(ROLES.ADMIN),
  userController.listCleaners
);

export default router;
