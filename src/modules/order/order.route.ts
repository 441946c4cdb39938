import { Router } from "express";

import { ROLES } from "@/constants/app.constants";
import { authMiddleware } from "@/middlewares/auth.middleware";

import { OrderController } from "./order.controller";

const router = Router();
const controller = new OrderController();

router.get("/timeslots", controller.getTimeslots);
router.post("/calculate", controller.calculate);

router.use(authMiddleware.verifyToken);

router.post(
  "/",
  authMiddleware.authorize(ROLES.CLIENT),
  controller.createOrder
);
router.get(
  "/me",
  authMiddleware.authorize(ROLES.CLIENT),
  controller.listMyOrders
);
router.get(
  "/me/:orderId",
  authMiddleware.authorize(ROLES.CLIENT),
  controller.getMyOrder
);

router.get("/", authMiddleware.authorize(ROLES.ADMIN), controller.listOrders);
router.get(
  "/:orderId",
  authMiddleware.authorize(ROLES.ADMIN),
  controller.getOrder
);
router.patch(
  "/:orderId/status",
  authMiddleware.authorize(ROLES.ADMIN),
  controller.updateStatus
);
router.patch(
  "/:orderId/cleaner",
  authMiddleware.authorize(ROLES.ADMIN),
  controller.assignCleaner
);

export default router;
