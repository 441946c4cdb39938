import { Router } from "express";

import { ROLES } from "@/constants/app.constants";
import { authMiddleware } from "@/middlewares/auth.middleware";

import { PricingController } from "./pricing.controller";

const router = Router();
const controller = new PricingController();

router.get("/services/:serviceId/structure", controller.getStructure);
router.post("/services/:serviceId/preview", controller.previewPrice);

router.use(authMiddleware.verifyToken, authMiddleware.authorize(ROLES.ADMIN));

router.get("/services/:serviceId/blocks", controller.listBlocks);
router.post("/services/:serviceId/blocks", controller.createBlock);
router.put("/services/:serviceId/blocks/order", controller.reorderBlocks);
router.patch("/blocks/:blockId", controller.updateBlock);
router.delete("/blocks/:blockId", controller.deactivateBlock);

export default router;
